// @vitest-environment happy-dom

import { describe, expect, it } from '@effect/vitest'
import { Effect } from 'effect'
import { Assets } from '../../src/index.js'

describe('Assets.loadImage', () => {
  it.effect('resolves an image once it has loaded', () =>
    Effect.gen(function* () {
      const image = document.createElement('img')
      const assets = Assets.browser({
        baseUrl: 'assets',
        createImage: () => {
          queueMicrotask(() => image.dispatchEvent(new Event('load')))
          return image
        },
      })
      const loaded = yield* assets.loadImage('Stone.png')
      expect(loaded.source).toBe(image)
      expect(image.getAttribute('src')).toBe('assets/Stone.png')
    }),
  )

  it.effect('fails when the image cannot be loaded', () =>
    Effect.gen(function* () {
      const assets = Assets.browser({
        baseUrl: '',
        createImage: () => {
          const image = document.createElement('img')
          queueMicrotask(() => image.dispatchEvent(new Event('error')))
          return image
        },
      })
      const error = yield* assets.loadImage('BG.png').pipe(Effect.flip)
      expect(error.reason).toBe('image')
      expect(error.message).toBe('Error loading image BG.png')
    }),
  )
})

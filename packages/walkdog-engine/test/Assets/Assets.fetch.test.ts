import { describe, expect, it } from '@effect/vitest'
import { Effect } from 'effect'
import { Assets } from '../../src/index.js'

const respondWith = (routes: Record<string, () => Response>, seen: Array<string>) => (url: string) => {
  seen.push(url)
  const route = routes[url]
  return Promise.resolve(route === undefined ? new Response('not found', { status: 404 }) : route())
}

describe('Assets.resolvePath', () => {
  it('joins with exactly one slash', () => {
    expect(Assets.resolvePath('/static/', '/rhb.json')).toBe('/static/rhb.json')
    expect(Assets.resolvePath('https://cdn.example.test', 'BG.png')).toBe('https://cdn.example.test/BG.png')
    expect(Assets.resolvePath('', 'BG.png')).toBe('BG.png')
  })
})

describe('Assets.browser', () => {
  it.effect('fetches JSON relative to the base URL', () =>
    Effect.gen(function* () {
      const seen: Array<string> = []
      const assets = Assets.browser({
        baseUrl: 'assets/',
        fetch: respondWith({ 'assets/rhb.json': () => new Response('{"frames":{}}', { status: 200 }) }, seen),
      })
      const json = yield* assets.fetchJson('rhb.json')
      expect(json).toEqual({ frames: {} })
      expect(seen).toEqual(['assets/rhb.json'])
    }),
  )

  it.effect('fails with the status and url when the response is not ok', () =>
    Effect.gen(function* () {
      const assets = Assets.browser({ baseUrl: 'assets', fetch: respondWith({}, []) })
      const error = yield* assets.fetchJson('tiles.json').pipe(Effect.flip)
      expect(error.reason).toBe('fetch')
      expect(error.path).toBe('tiles.json')
      expect(error.message).toBe('fetch failed: 404 (assets/tiles.json)')
    }),
  )

  it.effect('reports unparseable JSON as a decode error', () =>
    Effect.gen(function* () {
      const assets = Assets.browser({
        baseUrl: '',
        fetch: respondWith({ 'rhb.json': () => new Response('{ not json', { status: 200 }) }, []),
      })
      const error = yield* assets.fetchJson('rhb.json').pipe(Effect.flip)
      expect(error.reason).toBe('decode')
      expect(error.message.startsWith('invalid JSON: ')).toBe(true)
    }),
  )

  it.effect('reads binary bodies', () =>
    Effect.gen(function* () {
      const assets = Assets.browser({
        baseUrl: '',
        fetch: respondWith({ 'jump.mp3': () => new Response(new Uint8Array([1, 2, 3]), { status: 200 }) }, []),
      })
      const buffer = yield* assets.fetchArrayBuffer('jump.mp3')
      expect(buffer.byteLength).toBe(3)
    }),
  )
})

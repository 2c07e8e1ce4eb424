// @vitest-environment happy-dom

import { describe, expect, it } from '@effect/vitest'
import { Context, Effect, Exit, Layer, Scope } from 'effect'
import { KeyState, Keyboard } from '../../src/index.js'

describe('Keyboard.browserLayer', () => {
  it.effect('queues key presses until drained and stops listening when the scope closes', () =>
    Effect.gen(function* () {
      const scope = yield* Scope.make()
      const context = yield* Layer.buildWithScope(Keyboard.browserLayer(document), scope)
      const keyboard = Context.get(context, Keyboard.Tag)

      document.dispatchEvent(new KeyboardEvent('keydown', { code: 'ArrowRight' }))
      document.dispatchEvent(new Event('keydown'))
      document.dispatchEvent(new KeyboardEvent('keyup', { code: 'ArrowRight' }))

      expect(yield* keyboard.drain).toEqual([KeyState.keyDown('ArrowRight'), KeyState.keyUp('ArrowRight')])
      expect(yield* keyboard.drain).toEqual([])

      yield* Scope.close(scope, Exit.void)
      document.dispatchEvent(new KeyboardEvent('keydown', { code: 'Space' }))
      expect(yield* keyboard.drain).toEqual([])
    }),
  )
})

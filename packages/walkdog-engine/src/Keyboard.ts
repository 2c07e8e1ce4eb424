import { Chunk, Context, Effect, Layer, Queue } from 'effect'
import type { KeyPress } from './KeyState.js'
import { listenKeyboard } from './internal/browser/domKeyboard.js'

export interface Service {
  /** Key presses queued since the previous drain, oldest first. */
  readonly drain: Effect.Effect<ReadonlyArray<KeyPress>>
}

export class Tag extends Context.Tag('@walkdog/engine/Keyboard')<Tag, Service>() {}

export const fromQueue = (queue: Queue.Queue<KeyPress>): Service => ({
  drain: Queue.takeAll(queue).pipe(Effect.map(Chunk.toReadonlyArray)),
})

/**
 * Listens for keydown/keyup on `target` for as long as the layer's scope is open.
 */
export const browserLayer = (target: EventTarget): Layer.Layer<Tag> =>
  Layer.scoped(
    Tag,
    Effect.gen(function* () {
      const queue = yield* Queue.unbounded<KeyPress>()
      yield* Effect.acquireRelease(
        Effect.sync(() => listenKeyboard(target, (press) => Queue.unsafeOffer(queue, press))),
        (detach) => Effect.sync(detach),
      )
      return fromQueue(queue)
    }),
  )

import { Context, Effect, Layer, Stream } from 'effect'

export interface Service {
  /** High-resolution time on the same clock as the frame timestamps. */
  readonly now: Effect.Effect<number>
  readonly frames: Stream.Stream<number>
}

export class Tag extends Context.Tag('@walkdog/engine/AnimationFrames')<Tag, Service>() {}

export interface FrameScheduler {
  requestAnimationFrame(callback: (time: number) => void): number
  cancelAnimationFrame(handle: number): void
  readonly performance: { now(): number }
}

/**
 * One timestamp per `requestAnimationFrame` callback. The pending frame is
 * cancelled when the consuming stream stops.
 */
export const browser = (scheduler: FrameScheduler): Service => ({
  now: Effect.sync(() => scheduler.performance.now()),
  frames: Stream.asyncPush<number>((emit) =>
    Effect.acquireRelease(
      Effect.sync(() => {
        const pending = { handle: 0 }
        const tick = (time: number) => {
          emit.single(time)
          pending.handle = scheduler.requestAnimationFrame(tick)
        }
        pending.handle = scheduler.requestAnimationFrame(tick)
        return pending
      }),
      (pending) => Effect.sync(() => scheduler.cancelAnimationFrame(pending.handle)),
    ),
  ),
})

export const browserLayer = (scheduler: FrameScheduler): Layer.Layer<Tag> => Layer.succeed(Tag, browser(scheduler))

/** A fixed, finite sequence of timestamps; `now` reports `start`. */
export const fromTimestamps = (timestamps: ReadonlyArray<number>, start = 0): Service => ({
  now: Effect.succeed(start),
  frames: Stream.fromIterable(timestamps),
})

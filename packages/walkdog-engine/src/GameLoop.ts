import { Effect, Stream } from 'effect'
import * as AnimationFrames from './AnimationFrames.js'
import * as Keyboard from './Keyboard.js'
import * as KeyState from './KeyState.js'
import * as Renderer from './Renderer.js'

/** Fixed update step in milliseconds (60 updates per second). */
export const FRAME_SIZE = (1 / 60) * 1000

/**
 * A game driven by the loop: initialized once, then updated at a fixed rate and
 * drawn once per animation frame.
 */
export interface Game<S, E = never, R = never> {
  readonly initialize: Effect.Effect<S, E, R>
  readonly update: (state: S, keys: KeyState.KeyState) => Effect.Effect<S, E, R>
  readonly draw: (state: S, renderer: Renderer.Service) => void
}

export interface Clock {
  readonly lastFrame: number
  readonly accumulatedDelta: number
}

export const makeClock = (now: number): Clock => ({ lastFrame: now, accumulatedDelta: 0 })

/**
 * Accumulates the time since the last frame and converts it into a number of
 * fixed updates; the remainder carries over to the next frame.
 */
export const advance = (clock: Clock, now: number): { readonly clock: Clock; readonly updates: number } => {
  let accumulated = clock.accumulatedDelta + (now - clock.lastFrame)
  let updates = 0
  while (accumulated > FRAME_SIZE) {
    accumulated -= FRAME_SIZE
    updates += 1
  }
  return { clock: { lastFrame: now, accumulatedDelta: accumulated }, updates }
}

interface LoopState<S> {
  readonly game: S
  readonly keys: KeyState.KeyState
  readonly clock: Clock
}

/**
 * Initializes the game and runs it until the frame stream ends. Returns the final game state.
 */
export const start = <S, E, R>(
  game: Game<S, E, R>,
): Effect.Effect<S, E, R | Renderer.Tag | Keyboard.Tag | AnimationFrames.Tag> =>
  Effect.gen(function* () {
    const renderer = yield* Renderer.Tag
    const keyboard = yield* Keyboard.Tag
    const frames = yield* AnimationFrames.Tag

    const initial = yield* game.initialize
    const now = yield* frames.now
    yield* Effect.logDebug('game loop started')

    const onFrame = (loop: LoopState<S>, time: number): Effect.Effect<LoopState<S>, E, R> =>
      Effect.gen(function* () {
        const presses = yield* keyboard.drain
        const keys = KeyState.applyAll(loop.keys, presses)
        const step = advance(loop.clock, time)
        let state = loop.game
        for (let i = 0; i < step.updates; i++) {
          state = yield* game.update(state, keys)
        }
        game.draw(state, renderer)
        return { game: state, keys, clock: step.clock }
      })

    const last = yield* Stream.runFoldEffect(
      frames.frames,
      { game: initial, keys: KeyState.empty, clock: makeClock(now) },
      onFrame,
    )
    return last.game
  })

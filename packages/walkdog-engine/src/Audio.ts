import { Context, Effect, Layer } from 'effect'
import * as Assets from './Assets.js'
import { AudioError, messageOf } from './Errors.js'
import { makeWebAudio, type AudioGraph } from './internal/browser/webAudio.js'

export type { AudioGraph, AudioSource } from './internal/browser/webAudio.js'

/** Handle to a loaded clip; the service keeps the decoded data. */
export interface Sound {
  readonly path: string
}

export interface Service {
  readonly loadSound: (path: string) => Effect.Effect<Sound, AudioError>
  readonly playSound: (sound: Sound) => Effect.Effect<void, AudioError>
  readonly playLooping: (sound: Sound) => Effect.Effect<void, AudioError>
}

export class Tag extends Context.Tag('@walkdog/engine/Audio')<Tag, Service>() {}

export const webAudio = <Buffer, Destination>(
  graph: AudioGraph<Buffer, Destination>,
  assets: Assets.Service,
): Service => makeWebAudio(graph, assets)

export const silent: Service = {
  loadSound: (path) => Effect.succeed({ path }),
  playSound: () => Effect.void,
  playLooping: () => Effect.void,
}

export const silentLayer: Layer.Layer<Tag> = Layer.succeed(Tag, silent)

/**
 * Web Audio backed service; the AudioContext is created when the layer is built.
 */
export const browserLayer: Layer.Layer<Tag, AudioError, Assets.Tag> = Layer.effect(
  Tag,
  Effect.gen(function* () {
    const assets = yield* Assets.Tag
    const context = yield* Effect.try({
      try: () => new AudioContext(),
      catch: (cause) => new AudioError({ message: `AudioContext unavailable: ${messageOf(cause)}`, cause }),
    })
    return makeWebAudio(context, assets)
  }),
)

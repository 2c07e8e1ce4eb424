import { Effect } from 'effect'
import type { Service as AssetsService } from '../../Assets.js'
import type { Service, Sound } from '../../Audio.js'
import { AudioError, messageOf } from '../../Errors.js'

// The slice of the Web Audio API the game uses; `AudioContext` satisfies it.
export interface AudioSource<Buffer, Destination> {
  buffer: Buffer | null
  loop: boolean
  connect(destination: Destination): unknown
  start(when?: number): void
}

export interface AudioGraph<Buffer, Destination> {
  readonly destination: Destination
  decodeAudioData(data: ArrayBuffer): Promise<Buffer>
  createBufferSource(): AudioSource<Buffer, Destination>
}

export const makeWebAudio = <Buffer, Destination>(
  graph: AudioGraph<Buffer, Destination>,
  assets: AssetsService,
): Service => {
  const buffers = new Map<string, Buffer>()

  const loadSound = (path: string): Effect.Effect<Sound, AudioError> =>
    assets.fetchArrayBuffer(path).pipe(
      Effect.mapError((error) => new AudioError({ path, message: error.message, cause: error })),
      Effect.flatMap((data) =>
        Effect.tryPromise({
          try: () => graph.decodeAudioData(data),
          catch: (cause) => new AudioError({ path, message: `decode failed: ${messageOf(cause)}`, cause }),
        }),
      ),
      Effect.map((buffer) => {
        buffers.set(path, buffer)
        return { path }
      }),
    )

  const play = (sound: Sound, loop: boolean): Effect.Effect<void, AudioError> =>
    Effect.suspend(() => {
      const buffer = buffers.get(sound.path)
      if (buffer === undefined) {
        return Effect.fail(new AudioError({ path: sound.path, message: 'sound was not loaded' }))
      }
      return Effect.try({
        try: () => {
          const source = graph.createBufferSource()
          source.buffer = buffer
          source.loop = loop
          source.connect(graph.destination)
          source.start(0)
        },
        catch: (cause) => new AudioError({ path: sound.path, message: messageOf(cause), cause }),
      })
    })

  return {
    loadSound,
    playSound: (sound) => play(sound, false),
    playLooping: (sound) => play(sound, true),
  }
}

import { Effect, Layer } from 'effect'
import * as AnimationFrames from './AnimationFrames.js'
import * as Assets from './Assets.js'
import * as Audio from './Audio.js'
import type { EngineConfigShape } from './Config.js'
import { AudioError, UiError } from './Errors.js'
import * as Keyboard from './Keyboard.js'
import * as Logging from './Logging.js'
import * as Renderer from './Renderer.js'
import * as Ui from './Ui.js'

export type Services = Renderer.Tag | Keyboard.Tag | AnimationFrames.Tag | Assets.Tag | Audio.Tag | Ui.Tag

export interface Host {
  readonly document: Document
  readonly window: AnimationFrames.FrameScheduler
}

const rendererLayer = (host: Host, config: EngineConfigShape): Layer.Layer<Renderer.Tag, UiError> =>
  Layer.effect(
    Renderer.Tag,
    Effect.gen(function* () {
      const canvas = host.document.getElementById(config.canvasId)
      if (!(canvas instanceof HTMLCanvasElement)) {
        return yield* Effect.fail(
          new UiError({ elementId: config.canvasId, message: `canvas #${config.canvasId} not found` }),
        )
      }
      const context = canvas.getContext('2d')
      if (context === null) {
        return yield* Effect.fail(new UiError({ elementId: config.canvasId, message: '2d context unavailable' }))
      }
      return Renderer.canvas(context, { outlines: config.debugOutlines })
    }),
  )

/**
 * Every service the game loop and the game need, backed by the page's DOM.
 */
export const layer = (config: EngineConfigShape, host: Host): Layer.Layer<Services, UiError | AudioError> => {
  const assets = Assets.layer({ baseUrl: config.assetBaseUrl })
  const audioBase: Layer.Layer<Audio.Tag, AudioError, Assets.Tag> = config.audioEnabled
    ? Audio.browserLayer
    : Audio.silentLayer
  const audio = audioBase.pipe(Layer.provide(assets))
  return Layer.mergeAll(
    rendererLayer(host, config),
    Keyboard.browserLayer(host.document),
    AnimationFrames.browserLayer(host.window),
    Ui.browserLayer(host.document, { uiId: config.uiId, canvasId: config.canvasId }),
    assets,
    audio,
    Logging.layer(config.logLevel),
  )
}

import { Config, LogLevel } from 'effect'

export interface EngineConfigShape {
  readonly canvasId: string
  readonly uiId: string
  readonly assetBaseUrl: string
  readonly debugOutlines: boolean
  readonly audioEnabled: boolean
  readonly logLevel: LogLevel.LogLevel
}

/**
 * Engine settings under the `walkdog` namespace, e.g. `walkdog.canvas_id`.
 * Every key has a default, so an empty provider yields a working browser setup.
 */
export const EngineConfig: Config.Config<EngineConfigShape> = Config.all({
  canvasId: Config.string('canvas_id').pipe(Config.withDefault('canvas')),
  uiId: Config.string('ui_id').pipe(Config.withDefault('ui')),
  assetBaseUrl: Config.string('asset_base_url').pipe(Config.withDefault('')),
  debugOutlines: Config.boolean('debug_outlines').pipe(Config.withDefault(false)),
  audioEnabled: Config.boolean('audio_enabled').pipe(Config.withDefault(true)),
  logLevel: Config.logLevel('log_level').pipe(Config.withDefault(LogLevel.Info)),
}).pipe(Config.nested('walkdog'))

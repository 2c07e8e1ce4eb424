import { describe, expect, it } from '@effect/vitest'
import { ConfigProvider, Effect, LogLevel } from 'effect'
import { EngineConfig } from '../../src/index.js'

const load = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.gen(function* () {
    return yield* EngineConfig
  }).pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))))

describe('EngineConfig', () => {
  it.effect('defaults every key', () =>
    Effect.gen(function* () {
      const config = yield* load([])
      expect(config).toEqual({
        canvasId: 'canvas',
        uiId: 'ui',
        assetBaseUrl: '',
        debugOutlines: false,
        audioEnabled: true,
        logLevel: LogLevel.Info,
      })
    }),
  )

  it.effect('reads keys under the walkdog namespace', () =>
    Effect.gen(function* () {
      const config = yield* load([
        ['walkdog.canvas_id', 'stage'],
        ['walkdog.debug_outlines', 'true'],
        ['walkdog.audio_enabled', 'false'],
        ['walkdog.log_level', 'Debug'],
      ])
      expect(config.canvasId).toBe('stage')
      expect(config.debugOutlines).toBe(true)
      expect(config.audioEnabled).toBe(false)
      expect(config.logLevel).toEqual(LogLevel.Debug)
    }),
  )

  it.effect('rejects a malformed flag', () =>
    Effect.gen(function* () {
      const error = yield* load([['walkdog.debug_outlines', 'sometimes']]).pipe(Effect.flip)
      expect(error._op).toBe('InvalidData')
    }),
  )
})

import { Browser, EngineConfig, GameLoop, Logging } from '@walkdog/engine'
import { WalkTheDog } from '@walkdog/game'
import { ConfigProvider, Effect } from 'effect'

const ENV_PREFIX = 'VITE_WALKDOG_'

// VITE_WALKDOG_ASSET_BASE_URL -> walkdog.asset_base_url
const fromViteEnv = (env: Readonly<Record<string, unknown>>): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(
    new Map(
      Object.entries(env).flatMap(([key, value]): Array<[string, string]> =>
        key.startsWith(ENV_PREFIX) && typeof value === 'string'
          ? [[`walkdog.${key.slice(ENV_PREFIX.length).toLowerCase()}`, value]]
          : [],
      ),
    ),
  )

const program = Effect.gen(function* () {
  const config = yield* EngineConfig
  yield* GameLoop.start(WalkTheDog.game).pipe(Effect.provide(Browser.layer(config, { document, window })))
})

Effect.runFork(Logging.reportDefects(program, 'walk the dog').pipe(Effect.withConfigProvider(fromViteEnv(import.meta.env))))

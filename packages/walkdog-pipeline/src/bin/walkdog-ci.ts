#!/usr/bin/env node
import { ConfigProvider, Effect, Layer, Logger, LogLevel } from 'effect'
import process from 'node:process'

import { main } from '../Cli.js'
import { CiConfig } from '../Config.js'

const writeStdout = (text: string): void => {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`)
}

const provider = ConfigProvider.fromEnv().pipe(ConfigProvider.constantCase)

const program = Effect.gen(function* () {
  const { logLevel } = yield* CiConfig.pipe(Effect.orElseSucceed(() => ({ logLevel: LogLevel.Info })))
  return yield* main(process.argv.slice(2)).pipe(Logger.withMinimumLogLevel(logLevel))
}).pipe(
  Effect.provide(
    Layer.merge(Logger.replace(Logger.defaultLogger, Logger.prettyLogger({ stderr: true })), Layer.setConfigProvider(provider)),
  ),
)

Effect.runPromise(program).then(
  (outcome) => {
    writeStdout(outcome.stdout)
    process.exitCode = outcome.exitCode
  },
  (cause: unknown) => {
    process.stderr.write(`${String(cause)}\n`)
    process.exitCode = 1
  },
)

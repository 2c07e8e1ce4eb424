import { Config, LogLevel } from 'effect'

export interface CiConfigShape {
  readonly root: string
  readonly workflowFile: string
  readonly logLevel: LogLevel.LogLevel
}

/** `walkdog_ci.*`; read from `WALKDOG_CI_*` environment variables by the CLI. */
export const CiConfig: Config.Config<CiConfigShape> = Config.all({
  root: Config.string('root').pipe(Config.withDefault('.')),
  workflowFile: Config.string('workflow_file').pipe(Config.withDefault('.github/workflows/build.yml')),
  logLevel: Config.logLevel('log_level').pipe(Config.withDefault(LogLevel.Info)),
}).pipe(Config.nested('walkdog_ci'))

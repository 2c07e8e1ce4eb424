import { ConfigError, Effect, Either } from 'effect'
import path from 'node:path'
import { CiConfig } from './Config.js'
import {
  CliUsageError,
  describeProblem,
  type DependencyResolutionError,
  type IoError,
  type ManifestError,
  type WorkflowDriftError,
} from './Errors.js'
import * as Fs from './internal/fs.js'
import * as LocalExecutor from './LocalExecutor.js'
import { verifyProject } from './Manifest.js'
import { formatReport, runJob, StepExecutor, type StepExecutorService } from './Runner.js'
import { buildWorkflow, checkWorkflow, renderWorkflow, selectSteps } from './Workflow.js'

export type Invocation =
  | { readonly kind: 'help' }
  | { readonly kind: 'render'; readonly out?: string }
  | { readonly kind: 'check'; readonly file?: string }
  | { readonly kind: 'verify'; readonly root?: string }
  | { readonly kind: 'run'; readonly root?: string; readonly only?: ReadonlyArray<string> }

export interface RunOutcome {
  readonly stdout: string
  readonly exitCode: 0 | 1 | 2
}

export interface CliHost {
  readonly executor: (root: string) => StepExecutorService
}

const defaultHost: CliHost = {
  executor: (root) => LocalExecutor.make({ root }),
}

export const helpText = (): string => `walkdog-ci

Usage:
  walkdog-ci render [--out <path>]                   print the workflow YAML, or write it to a file
  walkdog-ci check [--file <path>]                   exit 1 when the workflow file drifts from the model
  walkdog-ci verify [--root <dir>]                   check installed dependencies against the manifests
  walkdog-ci run [--root <dir>] [--only <id,...>]    run the build job locally

Environment:
  WALKDOG_CI_ROOT            repository root (default .)
  WALKDOG_CI_WORKFLOW_FILE   workflow file under the root (default .github/workflows/build.yml)
  WALKDOG_CI_LOG_LEVEL       log level (default Info)

Exit codes: 0 ok, 1 failure, 2 usage error
`

const FLAGS: ReadonlyMap<string, ReadonlyArray<string>> = new Map([
  ['render', ['--out']],
  ['check', ['--file']],
  ['verify', ['--root']],
  ['run', ['--root', '--only']],
])

const usage = (message: string): Either.Either<never, CliUsageError> => Either.left(new CliUsageError({ message }))

const readFlags = (
  command: string,
  args: ReadonlyArray<string>,
): Either.Either<ReadonlyMap<string, string>, CliUsageError> => {
  const allowed = FLAGS.get(command) ?? []
  const flags = new Map<string, string>()
  for (let index = 0; index < args.length; index += 2) {
    const name = args[index] ?? ''
    const value = args[index + 1]
    if (!allowed.includes(name)) return usage(`unknown option ${name} for ${command}`)
    if (value === undefined || value.startsWith('--')) return usage(`${name} needs a value`)
    flags.set(name, value)
  }
  return Either.right(flags)
}

export const parseArgs = (argv: ReadonlyArray<string>): Either.Either<Invocation, CliUsageError> => {
  const [command, ...rest] = argv
  if (command === undefined) return usage('missing command')
  if (command === 'help' || command === '-h' || command === '--help') return Either.right({ kind: 'help' })
  if (!FLAGS.has(command)) return usage(`unknown command ${command}`)

  return Either.flatMap(readFlags(command, rest), (flags): Either.Either<Invocation, CliUsageError> => {
    switch (command) {
      case 'render':
        return Either.right({ kind: 'render', out: flags.get('--out') })
      case 'check':
        return Either.right({ kind: 'check', file: flags.get('--file') })
      case 'verify':
        return Either.right({ kind: 'verify', root: flags.get('--root') })
      default: {
        const only = flags.get('--only')
        const ids = only
          ?.split(',')
          .map((id) => id.trim())
          .filter((id) => id.length > 0)
        if (ids !== undefined && ids.length === 0) return usage('--only needs at least one step id')
        return Either.right({ kind: 'run', root: flags.get('--root'), only: ids })
      }
    }
  })
}

type CliError =
  | CliUsageError
  | ManifestError
  | IoError
  | DependencyResolutionError
  | WorkflowDriftError
  | ConfigError.ConfigError

const errorOutcome = (error: CliError): Effect.Effect<RunOutcome> => {
  if (ConfigError.isConfigError(error)) {
    return Effect.logError('invalid configuration', error).pipe(Effect.as({ stdout: String(error), exitCode: 1 as const }))
  }
  switch (error._tag) {
    case 'CliUsageError':
      return Effect.succeed({ stdout: `${error.message}\n\n${helpText()}`, exitCode: 2 })
    case 'DependencyResolutionError':
      return Effect.logError(error.message).pipe(
        Effect.as({ stdout: error.problems.map(describeProblem).join('\n'), exitCode: 1 as const }),
      )
    default:
      return Effect.logError(error.message).pipe(Effect.as({ stdout: error.message, exitCode: 1 as const }))
  }
}

const run = (invocation: Invocation, host: CliHost) =>
  Effect.gen(function* () {
    const config = yield* CiConfig
    switch (invocation.kind) {
      case 'help':
        return { stdout: helpText(), exitCode: 0 } satisfies RunOutcome
      case 'render': {
        if (invocation.out === undefined) {
          return { stdout: renderWorkflow(buildWorkflow), exitCode: 0 } satisfies RunOutcome
        }
        yield* Fs.writeText(invocation.out, renderWorkflow(buildWorkflow))
        return { stdout: `wrote ${invocation.out}`, exitCode: 0 } satisfies RunOutcome
      }
      case 'check': {
        const file = invocation.file ?? path.join(config.root, config.workflowFile)
        yield* checkWorkflow(file)
        return { stdout: `${file} is up to date`, exitCode: 0 } satisfies RunOutcome
      }
      case 'verify': {
        const graph = yield* verifyProject(path.resolve(invocation.root ?? config.root))
        const lines = Array.from(graph, ([name, version]) => `${name}@${version}`).sort()
        return {
          stdout: [...lines, `verified ${String(graph.size)} dependencies`].join('\n'),
          exitCode: 0,
        } satisfies RunOutcome
      }
      case 'run': {
        const root = path.resolve(invocation.root ?? config.root)
        const job =
          invocation.only === undefined ? buildWorkflow.job : yield* selectSteps(buildWorkflow.job, invocation.only)
        const report = yield* runJob(job).pipe(Effect.provideService(StepExecutor, host.executor(root)))
        return { stdout: formatReport(report), exitCode: report.status === 'success' ? 0 : 1 } satisfies RunOutcome
      }
    }
  })

/** Runs one CLI invocation; never fails, errors become the exit code. */
export const main = (argv: ReadonlyArray<string>, host: CliHost = defaultHost): Effect.Effect<RunOutcome> =>
  Either.match(parseArgs(argv), {
    onLeft: (error) => errorOutcome(error),
    onRight: (invocation) => run(invocation, host).pipe(Effect.catchAll(errorOutcome)),
  })

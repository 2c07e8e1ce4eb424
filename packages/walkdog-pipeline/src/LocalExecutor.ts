import { Effect, Layer, Option } from 'effect'
import { spawn } from 'node:child_process'
import path from 'node:path'
import process from 'node:process'
import { IoError, StepFailure, messageOf } from './Errors.js'
import * as Fs from './internal/fs.js'
import { parseVersion } from './internal/semver.js'
import { StepExecutor, type StepExecutorService, type StepResult } from './Runner.js'
import type { RunStep, Step, UsesStep } from './Workflow.js'

export interface ShellResult {
  readonly exitCode: number
  readonly output: string
}

export interface ShellOptions {
  readonly cwd: string
  readonly env: Readonly<Record<string, string | undefined>>
}

export type ShellRunner = (command: string, options: ShellOptions) => Effect.Effect<ShellResult, IoError>

export interface LocalExecutorOptions {
  /** Repository root; steps run here. */
  readonly root: string
  /** The running Node version, checked against the setup-node pin. */
  readonly nodeVersion?: string
  readonly shell?: ShellRunner
  readonly env?: Readonly<Record<string, string | undefined>>
}

/** Where upload-artifact copies land, relative to the root. */
export const ARTIFACTS_DIR = '.artifacts'

const OUTPUT_TAIL_BYTES = 64 * 1024

const tail = (text: string): string => (text.length > OUTPUT_TAIL_BYTES ? text.slice(-OUTPUT_TAIL_BYTES) : text)

/** Runs `command` through the system shell; the child is killed when the fiber is interrupted. */
export const spawnShell: ShellRunner = (command, options) =>
  Effect.async<ShellResult, IoError>((resume) => {
    let output = ''
    const child = spawn(command, { cwd: options.cwd, env: options.env, shell: true, stdio: ['ignore', 'pipe', 'pipe'] })
    const collect = (chunk: Buffer): void => {
      output = tail(output + chunk.toString('utf8'))
    }
    child.stdout.on('data', collect)
    child.stderr.on('data', collect)
    child.once('error', (cause) => {
      resume(Effect.fail(new IoError({ path: options.cwd, message: `cannot run ${command}: ${messageOf(cause)}`, cause })))
    })
    child.once('close', (code) => {
      resume(Effect.succeed({ exitCode: code ?? 1, output }))
    })
    return Effect.sync(() => {
      child.kill()
    })
  })

// `${{ ... }}` expressions only have a value on the hosted runner.
const localEnv = (step: Step): Record<string, string> =>
  Object.fromEntries(Object.entries(step.env ?? {}).filter(([, value]) => !value.includes('${{')))

const fail = (step: Step, message: string, exitCode = 1, output = ''): StepFailure =>
  new StepFailure({ stepId: step.id, exitCode, message, output })

const actionName = (step: UsesStep): string => step.uses.split('@')[0] ?? step.uses

export const make = (options: LocalExecutorOptions): StepExecutorService => {
  const shell = options.shell ?? spawnShell
  const env = options.env ?? process.env
  const nodeVersion = options.nodeVersion ?? process.versions.node

  const runCommand = (step: RunStep): Effect.Effect<StepResult, StepFailure> =>
    shell(step.run, { cwd: options.root, env: { ...env, ...localEnv(step) } }).pipe(
      Effect.mapError((error) => fail(step, error.message, 127)),
      Effect.flatMap((result) =>
        result.exitCode === 0
          ? Effect.succeed({ output: result.output })
          : Effect.fail(fail(step, `${step.run} exited with code ${String(result.exitCode)}`, result.exitCode, result.output)),
      ),
    )

  const checkNode = (step: UsesStep): Effect.Effect<StepResult, StepFailure> => {
    const pin = step.with['node-version'] ?? ''
    const wanted = parseVersion(pin)
    const running = parseVersion(nodeVersion)
    if (Option.isNone(wanted) || Option.isNone(running)) {
      return Effect.fail(fail(step, `cannot compare node ${nodeVersion} with pin ${pin}`))
    }
    return wanted.value.major === running.value.major
      ? Effect.succeed({ output: `node ${nodeVersion}` })
      : Effect.fail(fail(step, `node ${nodeVersion} does not match pinned ${pin}`))
  }

  const uploadArtifact = (step: UsesStep): Effect.Effect<StepResult, StepFailure> => {
    const name = step.with.name ?? 'artifact'
    const source = path.resolve(options.root, step.with.path ?? '.')
    const destination = path.join(options.root, ARTIFACTS_DIR, name)
    return Fs.exists(source).pipe(
      Effect.flatMap((found) =>
        found
          ? Fs.copyTree(source, destination).pipe(
              Effect.mapError((error) => fail(step, error.message)),
              Effect.as({ output: `${name} -> ${path.relative(options.root, destination)}` }),
            )
          : Effect.fail(fail(step, `artifact path ${step.with.path ?? '.'} does not exist`)),
      ),
    )
  }

  const runAction = (step: UsesStep): Effect.Effect<StepResult, StepFailure> => {
    switch (actionName(step)) {
      case 'actions/checkout':
      case 'actions/cache':
        return Effect.succeed({ output: '' })
      case 'actions/setup-node':
        return checkNode(step)
      case 'actions/upload-artifact':
        return uploadArtifact(step)
      default:
        return Effect.fail(fail(step, `no local equivalent for ${step.uses}`))
    }
  }

  return {
    execute: (step) => (step._tag === 'Run' ? runCommand(step) : runAction(step)),
  }
}

export const layer = (options: LocalExecutorOptions): Layer.Layer<StepExecutor> =>
  Layer.succeed(StepExecutor, StepExecutor.of(make(options)))

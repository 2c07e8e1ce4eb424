import { Effect, Option } from 'effect'
import { CliUsageError, WorkflowDriftError, type IoError } from './Errors.js'
import { commandLine, OUTPUT_DIR } from './Commands.js'
import * as Fs from './internal/fs.js'

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

export type StepRole = 'checkout' | 'toolchain' | 'cache' | 'install' | 'lint' | 'test' | 'build' | 'bundle' | 'artifact'

interface StepBase {
  readonly id: string
  readonly name: string
  readonly role: StepRole
  /** Advisory steps annotate the change and never halt the job. */
  readonly advisory: boolean
  readonly env?: Readonly<Record<string, string>>
}

export interface UsesStep extends StepBase {
  readonly _tag: 'Uses'
  /** `owner/action@version` */
  readonly uses: string
  readonly with: Readonly<Record<string, string>>
}

export interface RunStep extends StepBase {
  readonly _tag: 'Run'
  readonly run: string
}

export type Step = UsesStep | RunStep

export interface Job {
  readonly id: string
  readonly runsOn: string
  readonly permissions: string
  readonly steps: ReadonlyArray<Step>
}

export interface Workflow {
  readonly name: string
  readonly on: ReadonlyArray<string>
  readonly job: Job
}

export const uses = (
  id: string,
  name: string,
  role: StepRole,
  action: string,
  params: Readonly<Record<string, string>> = {},
): UsesStep => ({ _tag: 'Uses', id, name, role, advisory: false, uses: action, with: params })

export const run = (id: string, name: string, role: StepRole, command: string): RunStep => ({
  _tag: 'Run',
  id,
  name,
  role,
  advisory: false,
  run: command,
})

export const advisory = <S extends Step>(step: S, env?: Readonly<Record<string, string>>): S => ({
  ...step,
  advisory: true,
  ...(env === undefined ? {} : { env }),
})

export const NODE_VERSION = '20.18.0'
export const ARTIFACT_NAME = 'dist-artifact'

export const buildWorkflow: Workflow = {
  name: 'build',
  on: ['pull_request'],
  job: {
    id: 'build',
    runsOn: 'ubuntu-latest',
    permissions: 'write-all',
    steps: [
      uses('checkout', 'Checkout', 'checkout', 'actions/checkout@v4'),
      uses('toolchain', 'Setup Node', 'toolchain', 'actions/setup-node@v4', { 'node-version': NODE_VERSION }),
      uses('cache', 'Cache npm', 'cache', 'actions/cache@v4', {
        path: '~/.npm',
        key: "${{ runner.os }}-npm-${{ hashFiles('**/package.json') }}",
      }),
      run('install', 'Install', 'install', commandLine('install')),
      advisory(run('lint', 'Lint', 'lint', 'npm run lint'), { GITHUB_TOKEN: '${{ secrets.GITHUB_TOKEN }}' }),
      run('test', 'Test', 'test', commandLine('test')),
      run('build', 'Build', 'build', commandLine('build')),
      run('bundle', 'Bundle', 'bundle', commandLine('bundle')),
      uses('artifact', 'Upload artifact', 'artifact', 'actions/upload-artifact@v4', {
        name: ARTIFACT_NAME,
        path: `./${OUTPUT_DIR}/`,
      }),
    ],
  },
}

/** The artifact name an artifact step publishes. */
export const artifactName = (step: Step): Option.Option<string> =>
  step._tag === 'Uses' && step.role === 'artifact' ? Option.fromNullable(step.with.name) : Option.none()

/** Keeps only the listed steps, in job order. */
export const selectSteps = (job: Job, ids: ReadonlyArray<string>): Effect.Effect<Job, CliUsageError> => {
  const known = new Set(job.steps.map((step) => step.id))
  const unknown = ids.filter((id) => !known.has(id))
  if (unknown.length > 0) {
    return Effect.fail(
      new CliUsageError({
        message: `unknown step ${unknown.join(', ')} (expected one of ${job.steps.map((step) => step.id).join(', ')})`,
      }),
    )
  }
  const wanted = new Set(ids)
  return Effect.succeed({ ...job, steps: job.steps.filter((step) => wanted.has(step.id)) })
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const PLAIN_UNSAFE_START = /^[-?:,[\]{}#&*!|>'"%@`\s]/
// Scalars a YAML 1.1 or 1.2 reader resolves to something other than a string.
const RESERVED =
  /^(?:true|false|yes|no|y|n|on|off|null|~|[-+]?\.(?:inf|nan)|[-+]?0x[\da-f_]+|[-+]?0o?[0-7_]+|[-+]?0b[01_]+|[-+]?[\d._]+(?:e[-+]?\d+)?|[-+]?\d[\d_]*(?::[0-5]?\d)+(?:\.[\d_]*)?)$/i
// eslint-disable-next-line no-control-regex
const CONTROL = /[\u0000-\u001f\u007f]/

/**
 * A YAML scalar: plain where that reads back as the same string, double-quoted with escapes
 * when it holds a line break or other control character, single-quoted otherwise.
 */
export const scalar = (value: string): string => {
  if (CONTROL.test(value)) return JSON.stringify(value)
  const plain =
    value.length > 0 &&
    !PLAIN_UNSAFE_START.test(value) &&
    !RESERVED.test(value) &&
    !value.includes(': ') &&
    !value.includes(' #') &&
    !value.endsWith(':') &&
    !value.endsWith(' ')
  return plain ? value : `'${value.replaceAll("'", "''")}'`
}

const mapping = (indent: string, key: string, values: Readonly<Record<string, string>>): Array<string> => [
  `${indent}${key}:`,
  ...Object.entries(values).map(([name, value]) => `${indent}  ${scalar(name)}: ${scalar(value)}`),
]

const renderStep = (step: Step): Array<string> => {
  const lines = [`      - name: ${scalar(step.name)}`, `        id: ${scalar(step.id)}`]
  if (step._tag === 'Uses') {
    lines.push(`        uses: ${scalar(step.uses)}`)
    if (Object.keys(step.with).length > 0) lines.push(...mapping('        ', 'with', step.with))
  } else {
    lines.push(`        run: ${scalar(step.run)}`)
  }
  if (step.env !== undefined) lines.push(...mapping('        ', 'env', step.env))
  if (step.advisory) lines.push('        continue-on-error: true')
  return lines
}

/** The workflow file text. Keys always come out in the same order. */
export const renderWorkflow = (workflow: Workflow): string =>
  [
    `name: ${scalar(workflow.name)}`,
    'on:',
    ...workflow.on.map((event) => `  - ${scalar(event)}`),
    'jobs:',
    `  ${scalar(workflow.job.id)}:`,
    `    runs-on: ${scalar(workflow.job.runsOn)}`,
    `    permissions: ${scalar(workflow.job.permissions)}`,
    '    steps:',
    ...workflow.job.steps.flatMap(renderStep),
    '',
  ].join('\n')

// ---------------------------------------------------------------------------
// Drift
// ---------------------------------------------------------------------------

const normalize = (text: string): Array<string> =>
  text
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trimEnd()
    .split('\n')

/** The first line where `actual` differs from `expected`, 1-based. */
export const firstDifference = (expected: string, actual: string): Option.Option<number> => {
  const want = normalize(expected)
  const got = normalize(actual)
  const length = Math.max(want.length, got.length)
  for (let index = 0; index < length; index++) {
    if (want[index] !== got[index]) return Option.some(index + 1)
  }
  return Option.none()
}

/** Compares a checked-in workflow file with the rendered model. */
export const checkWorkflowText = (
  file: string,
  text: string,
  workflow: Workflow = buildWorkflow,
): Effect.Effect<void, WorkflowDriftError> =>
  Option.match(firstDifference(renderWorkflow(workflow), text), {
    onNone: (): Effect.Effect<void, WorkflowDriftError> => Effect.void,
    onSome: (line) => {
      const expected = normalize(renderWorkflow(workflow))[line - 1] ?? '<end of file>'
      const found = normalize(text)[line - 1] ?? '<end of file>'
      return Effect.fail(
        new WorkflowDriftError({
          file,
          message: `${file} drifted at line ${String(line)}: expected "${expected}", found "${found}"`,
        }),
      )
    },
  })

export const checkWorkflow = (
  file: string,
  workflow: Workflow = buildWorkflow,
): Effect.Effect<void, WorkflowDriftError | IoError> =>
  Fs.readText(file).pipe(Effect.flatMap((text) => checkWorkflowText(file, text, workflow)))

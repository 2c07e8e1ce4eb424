import { Context, Effect, Either, Option } from 'effect'
import type { StepFailure } from './Errors.js'
import { artifactName, type Job, type Step } from './Workflow.js'

export interface StepResult {
  /** Tail of the combined stdout/stderr. */
  readonly output: string
}

export interface StepExecutorService {
  readonly execute: (step: Step) => Effect.Effect<StepResult, StepFailure>
}

export class StepExecutor extends Context.Tag('@walkdog/pipeline/StepExecutor')<StepExecutor, StepExecutorService>() {}

export type StepStatus = 'success' | 'failure' | 'advisory-failure' | 'skipped'

export interface Annotation {
  readonly level: 'error' | 'warning'
  readonly stepId: string
  readonly message: string
  readonly file?: string
  readonly line?: number
  readonly column?: number
}

export interface StepOutcome {
  readonly id: string
  readonly name: string
  readonly status: StepStatus
  readonly exitCode?: number
  readonly message?: string
  readonly annotations: ReadonlyArray<Annotation>
}

export interface JobReport {
  readonly job: string
  readonly status: 'success' | 'failure'
  readonly steps: ReadonlyArray<StepOutcome>
  readonly annotations: ReadonlyArray<Annotation>
  readonly artifacts: ReadonlyArray<string>
}

// file(line,col): error TS2322: message
const TSC_DIAGNOSTIC = /^(.+)\((\d+),(\d+)\): (error|warning) (TS\d+): (.*)$/
// ESLint's stylish formatter: a file path line, then `  line:col  level  message  rule` rows under it.
const ESLINT_FILE = /^(\S.*\.[cm]?[jt]sx?)$/
const ESLINT_ROW = /^\s+(\d+):(\d+)\s+(error|warning)\s+(.+?)(?:\s{2,}(\S+))?\s*$/

/** Compiler diagnostics and ESLint findings in `output` as annotations. */
export const parseAnnotations = (stepId: string, output: string): ReadonlyArray<Annotation> => {
  const annotations: Array<Annotation> = []
  let file: string | undefined
  for (const line of output.split(/\r?\n/)) {
    const tsc = TSC_DIAGNOSTIC.exec(line.trim())
    if (tsc !== null) {
      const [, source, row, column, level, code, message] = tsc
      annotations.push({
        level: level === 'warning' ? 'warning' : 'error',
        stepId,
        file: source,
        line: Number(row),
        column: Number(column),
        message: `${code}: ${message}`,
      })
      continue
    }
    const header = ESLINT_FILE.exec(line)
    if (header !== null) {
      file = header[1]
      continue
    }
    const finding = file === undefined ? null : ESLINT_ROW.exec(line)
    if (finding === null) continue
    const [, row, column, level, message, rule] = finding
    annotations.push({
      level: level === 'warning' ? 'warning' : 'error',
      stepId,
      file,
      line: Number(row),
      column: Number(column),
      message: rule === undefined ? message : `${message} (${rule})`,
    })
  }
  return annotations
}

const advisoryAnnotations = (failure: StepFailure): ReadonlyArray<Annotation> => {
  const parsed = parseAnnotations(failure.stepId, failure.output)
  return parsed.length > 0 ? parsed : [{ level: 'warning', stepId: failure.stepId, message: failure.message }]
}

/**
 * Runs the steps in order. A blocking failure fails the job and skips every later step;
 * advisory findings become annotations whether the step passes or fails, and the job goes on.
 */
export const runJob = (job: Job): Effect.Effect<JobReport, never, StepExecutor> =>
  Effect.gen(function* () {
    const executor = yield* StepExecutor
    const steps: Array<StepOutcome> = []
    const artifacts: Array<string> = []
    let halted = false

    for (const step of job.steps) {
      if (halted) {
        steps.push({ id: step.id, name: step.name, status: 'skipped', annotations: [] })
        continue
      }

      yield* Effect.logInfo(`step ${step.id}: ${step.name}`)
      const outcome = yield* Effect.either(executor.execute(step))
      if (Either.isRight(outcome)) {
        // A linter that only reports warnings exits 0.
        const annotations = step.advisory ? parseAnnotations(step.id, outcome.right.output) : []
        steps.push({ id: step.id, name: step.name, status: 'success', annotations })
        const artifact = artifactName(step)
        if (Option.isSome(artifact)) artifacts.push(artifact.value)
        continue
      }

      const failure = outcome.left
      if (step.advisory) {
        yield* Effect.logWarning(`advisory step ${step.id} failed: ${failure.message}`)
        steps.push({
          id: step.id,
          name: step.name,
          status: 'advisory-failure',
          exitCode: failure.exitCode,
          message: failure.message,
          annotations: advisoryAnnotations(failure),
        })
        continue
      }

      yield* Effect.logError(`step ${step.id} failed: ${failure.message}`)
      steps.push({
        id: step.id,
        name: step.name,
        status: 'failure',
        exitCode: failure.exitCode,
        message: failure.message,
        annotations: [],
      })
      halted = true
    }

    const report: JobReport = {
      job: job.id,
      status: halted ? 'failure' : 'success',
      steps,
      annotations: steps.flatMap((outcome) => outcome.annotations),
      artifacts,
    }
    yield* Effect.logInfo(`job ${job.id}: ${report.status}`)
    return report
  })

const formatAnnotation = (annotation: Annotation): string => {
  const location =
    annotation.file === undefined
      ? `[${annotation.stepId}]`
      : `${annotation.file}:${String(annotation.line ?? 0)}:${String(annotation.column ?? 0)}`
  return `  ${annotation.level} ${location} ${annotation.message}`
}

export const formatReport = (report: JobReport): string => {
  const lines = [`${report.job}: ${report.status}`]
  for (const step of report.steps) {
    const detail = step.message === undefined ? '' : ` (${step.message})`
    lines.push(`  ${step.status.padEnd(16)} ${step.id}${detail}`)
  }
  if (report.annotations.length > 0) {
    lines.push('annotations:', ...report.annotations.map(formatAnnotation))
  }
  lines.push(`artifacts: ${report.artifacts.length > 0 ? report.artifacts.join(', ') : '(none)'}`)
  return lines.join('\n')
}

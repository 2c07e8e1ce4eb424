import { Data } from 'effect'

export class ManifestError extends Data.TaggedError('ManifestError')<{
  readonly path: string
  readonly message: string
  readonly cause?: unknown
}> {}

export type ResolutionProblem =
  | { readonly _tag: 'Missing'; readonly name: string; readonly constraint: string }
  | { readonly _tag: 'Duplicate'; readonly name: string; readonly versions: ReadonlyArray<string> }
  | { readonly _tag: 'Unsatisfied'; readonly name: string; readonly constraint: string; readonly version: string }

export const describeProblem = (problem: ResolutionProblem): string => {
  switch (problem._tag) {
    case 'Missing':
      return `${problem.name}@${problem.constraint} is not installed`
    case 'Duplicate':
      return `${problem.name} is installed more than once (${problem.versions.join(', ')})`
    case 'Unsatisfied':
      return `${problem.name}@${problem.version} does not satisfy ${problem.constraint}`
  }
}

export class DependencyResolutionError extends Data.TaggedError('DependencyResolutionError')<{
  readonly problems: ReadonlyArray<ResolutionProblem>
  readonly message: string
}> {}

export const resolutionError = (problems: ReadonlyArray<ResolutionProblem>): DependencyResolutionError =>
  new DependencyResolutionError({ problems, message: problems.map(describeProblem).join('; ') })

export class StepFailure extends Data.TaggedError('StepFailure')<{
  readonly stepId: string
  readonly exitCode: number
  readonly message: string
  /** Tail of the combined stdout/stderr. */
  readonly output: string
}> {}

export class WorkflowDriftError extends Data.TaggedError('WorkflowDriftError')<{
  readonly file: string
  readonly message: string
}> {}

export class CliUsageError extends Data.TaggedError('CliUsageError')<{
  readonly message: string
}> {}

export class IoError extends Data.TaggedError('IoError')<{
  readonly path: string
  readonly message: string
  readonly cause?: unknown
}> {}

export const messageOf = (cause: unknown): string => {
  if (typeof cause === 'string') return cause
  if (cause instanceof Error) return cause.message || cause.name || 'Error'
  return 'Unknown error'
}

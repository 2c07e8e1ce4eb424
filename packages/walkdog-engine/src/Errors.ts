import { Data } from 'effect'

export type AssetErrorReason = 'fetch' | 'decode' | 'image'

export class AssetError extends Data.TaggedError('AssetError')<{
  readonly path: string
  readonly reason: AssetErrorReason
  readonly message: string
  readonly cause?: unknown
}> {}

export class AudioError extends Data.TaggedError('AudioError')<{
  readonly path?: string
  readonly message: string
  readonly cause?: unknown
}> {}

export class UiError extends Data.TaggedError('UiError')<{
  readonly elementId: string
  readonly message: string
}> {}

export const messageOf = (cause: unknown): string => {
  if (typeof cause === 'string') return cause
  if (cause instanceof Error) return cause.message || cause.name || 'Error'
  return 'Unknown error'
}

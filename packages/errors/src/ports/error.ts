export type ErrorContext = Readonly<Record<string, unknown>>

/** An error a caller can branch on by `code` instead of parsing `message`. */
export interface CodedError<C extends string = string> extends Error {
  readonly code: C
  /** Frozen copy of the details supplied at construction */
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly cause?: unknown
}

/** JSON-safe shape written to logs. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>

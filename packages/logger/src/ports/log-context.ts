export type LogContext = {
  /** Server-assigned request id, when the API returned one */
  requestId: string

  method: string
  path: string

  /** 0-indexed attempt number within one logical call */
  attempt: number
  status: number
  durationMs: number

  service: string
  module: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

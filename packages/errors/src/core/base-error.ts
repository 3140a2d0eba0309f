import type { CodedError, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends string = string> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
}>

export class BaseError<C extends string = string> extends Error implements CodedError<C> {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Default: false */
  includeStack?: boolean
}>

/**
 * Flattens a thrown value and its cause chain. Errors that are not a
 * `BaseError` get code `"unknown"`; non-Error values end up in `context.value`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isRetryable: false,
    }
  }

  const coded = err instanceof BaseError

  return {
    name: err.name,
    code: coded ? err.code : "unknown",
    message: err.message,
    context: coded ? { ...err.context } : {},
    isRetryable: coded && err.isRetryable,
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack ? { stack: err.stack } : {}),
  }
}

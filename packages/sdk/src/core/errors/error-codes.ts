export const errorCodes = [
  "invalid_url",
  "invalid_request",
  "missing_required",
  "unauthorized",
  "invalid_api_key",
  "expired_signature",
  "forbidden",
  "insufficient_credits",
  "not_found",
  "rate_limited",
  "timeout",
  "render_failed",
  "internal_error",
  "connection_error",
] as const

export type ErrorCode = (typeof errorCodes)[number]

/** A known code, "" when none applies, or a code the server sent verbatim. */
export type ApiErrorCode = ErrorCode | "" | (string & {})

const retryableCodes: ReadonlySet<string> = new Set<ErrorCode>([
  "rate_limited",
  "timeout",
  "render_failed",
  "internal_error",
  "connection_error",
])

export function isRetryableCode(code: string): boolean {
  return retryableCodes.has(code)
}

import { isJsonObject } from "../../ports/json"
import { ApiError } from "./api-error"
import type { ApiErrorCode } from "./error-codes"

export type ErrorResponse = {
  status: number
  /** Decoded JSON body, `{}` when absent or unreadable */
  body: unknown
  /** Raw `Retry-After` header */
  retryAfter?: string | null
  /** Raw `X-Request-Id` header */
  requestId?: string | null
}

const statusCodes: ReadonlyMap<number, ApiErrorCode> = new Map([
  [400, "invalid_request"],
  [401, "unauthorized"],
  [403, "forbidden"],
  [404, "not_found"],
  [408, "timeout"],
  [422, "invalid_request"],
  [429, "rate_limited"],
])

function codeForStatus(status: number): ApiErrorCode {
  if (status >= 500) return "internal_error"
  return statusCodes.get(status) ?? ""
}

function stringField(obj: unknown, key: string): string | undefined {
  if (!isJsonObject(obj)) return undefined

  const value = obj[key]
  return typeof value === "string" ? value : undefined
}

/**
 * Seconds from a `Retry-After` header. Only non-negative decimal integers are
 * honored; anything else is 0.
 */
export function parseRetryAfter(value: string | null | undefined): number {
  if (!value || !/^[+-]?\d+$/.test(value)) return 0

  const seconds = Number(value)
  return Number.isSafeInteger(seconds) && seconds > 0 ? seconds : 0
}

/**
 * Builds the `ApiError` for a failed response.
 *
 * The body's `error.message` and `error.code` win over status-derived
 * defaults; the request id comes from the header, then `error.request_id`,
 * then a top-level `request_id`.
 */
export function classifyResponse(response: ErrorResponse): ApiError {
  const { status, body } = response
  const detail = isJsonObject(body) ? body.error : undefined

  const message = stringField(detail, "message") ?? `HTTP ${status} error`
  const code = stringField(detail, "code") || codeForStatus(status)
  const requestId =
    response.requestId ||
    stringField(detail, "request_id") ||
    stringField(body, "request_id") ||
    undefined

  return new ApiError(message, {
    httpStatus: status,
    code,
    retryAfter: parseRetryAfter(response.retryAfter),
    ...(requestId ? { requestId } : {}),
  })
}

import { ApiError } from "./api-error"

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError
}

export function isNotFound(err: unknown): boolean {
  return isApiError(err) && (err.httpStatus === 404 || err.code === "not_found")
}

export function isRetryableError(err: unknown): boolean {
  return isApiError(err) && err.isRetryable
}

export function isRateLimited(err: unknown): boolean {
  return isApiError(err) && (err.httpStatus === 429 || err.code === "rate_limited")
}

export function isAuthenticationError(err: unknown): boolean {
  return isApiError(err) && err.httpStatus === 401
}

export function isValidationError(err: unknown): boolean {
  if (!isApiError(err)) return false

  return err.httpStatus === 400 || (err.httpStatus === 422 && err.code !== "render_failed")
}

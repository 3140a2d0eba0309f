import { createAbortError } from "@renderscreenshot/clock"
import { findInChain } from "@renderscreenshot/errors"
import { ApiError } from "../errors/api-error"

const timeoutPattern = /time(d)?[\s_-]?out|deadline/i

function namesTimeout(value: unknown): boolean {
  if (value instanceof DOMException && value.name === "TimeoutError") return true
  if (typeof value !== "object" || value === null) return false

  if ("code" in value && typeof value.code === "string" && timeoutPattern.test(value.code)) {
    return true
  }
  return value instanceof Error && timeoutPattern.test(value.message)
}

function describeFailure(err: unknown): string {
  const messages = findInChain(err, (e): e is Error => e instanceof Error && e !== err)
  if (err instanceof Error) {
    return messages ? `${err.message}: ${messages.message}` : err.message
  }
  return String(err)
}

/**
 * Maps a failed exchange (no HTTP status) to the error the caller sees.
 */
export function toNetworkError(
  err: unknown,
  timeoutSignal: AbortSignal,
  callerSignal?: AbortSignal,
): Error {
  if (callerSignal?.aborted) {
    return createAbortError()
  }

  if (timeoutSignal.aborted || findInChain(err, namesTimeout) !== undefined) {
    return ApiError.timeout(err)
  }

  return ApiError.connection(describeFailure(err), err)
}

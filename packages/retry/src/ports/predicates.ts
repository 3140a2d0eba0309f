import type { Milliseconds } from "@renderscreenshot/clock"
import type { AttemptContext } from "./attempt-context"

/**
 * Determines whether to retry after an error.
 */
export interface ErrorPredicate {
  shouldRetry(error: unknown, ctx: AttemptContext): boolean
}

/**
 * Error-directed delay, e.g. a server's Retry-After.
 * Returning `undefined` defers to the delay policy. A returned value is used
 * as-is, without the policy's bounds.
 */
export interface DelayHint {
  delayFor(error: unknown, ctx: AttemptContext): Milliseconds | undefined
}

import type { DelayPolicy } from "@renderscreenshot/backoff"
import type { RetryObserver } from "./observer"
import type { DelayHint, ErrorPredicate } from "./predicates"

/**
 * Configuration for retry behavior.
 *
 * @remarks
 * `maxAttempts` is total tries, not retries.
 * - maxAttempts=1 → try once, no retry
 * - maxAttempts=3 → try once + up to 2 retries
 */
export interface RetryConfig<T = unknown> {
  /** Total attempts (not retries). Must be >= 1 */
  maxAttempts: number

  delay: DelayPolicy

  /** Consulted before `delay` on each retry */
  delayHint?: DelayHint

  /** When to retry on thrown error. Default: always */
  errorPredicate?: ErrorPredicate

  observer?: RetryObserver<T>

  /** Stops further attempts and interrupts the sleep between them */
  signal?: AbortSignal
}

import type { AttemptContext, RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks for observability.
 *
 * @remarks
 * Observer methods should not throw. A throw is treated as a programmer error
 * and rejects `execute` in place of the attempt's outcome.
 */
export interface RetryObserver<T> {
  onAttempt?(ctx: AttemptContext): void
  onRetry?(error: unknown, info: RetryAttemptInfo): void
  onSuccess?(result: T, ctx: AttemptContext): void
  onExhausted?(error: unknown, info: RetryAttemptInfo): void
  onAborted?(ctx: AttemptContext): void
}

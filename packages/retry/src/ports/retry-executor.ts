import type { RetryConfig } from "./retry-config"
import type { RetryFn } from "./retry-fn"

/**
 * Executes functions with retry logic.
 *
 * @remarks
 * AbortSignal behavior:
 * - If already aborted at start → AbortError, fn is never called
 * - If aborted while sleeping → sleep is interrupted, AbortError
 * - If aborted during fn → no further attempts, AbortError
 *
 * Resolves with the first successful value, otherwise rejects with the last
 * error. Predicate and observer throws propagate.
 */
export interface RetryExecutor {
  execute<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<T>
}

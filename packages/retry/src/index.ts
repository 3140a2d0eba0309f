export { createRetryExecutor, type RetryExecutorDeps } from "./core/retry-executor"
export type { AttemptContext, RetryAttemptInfo } from "./ports/attempt-context"
export type { RetryObserver } from "./ports/observer"
export type { DelayHint, ErrorPredicate } from "./ports/predicates"
export type { RetryConfig } from "./ports/retry-config"
export type { RetryExecutor } from "./ports/retry-executor"
export type { RetryFn } from "./ports/retry-fn"

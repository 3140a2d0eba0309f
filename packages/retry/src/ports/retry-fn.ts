import type { AttemptContext } from "./attempt-context"

export type RetryFn<T> = (ctx: AttemptContext) => Promise<T>

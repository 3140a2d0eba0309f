import type { Clock } from "@renderscreenshot/clock"
import { createAbortError, isAbortError } from "@renderscreenshot/clock"
import type { AttemptContext, RetryAttemptInfo } from "../ports/attempt-context"
import type { RetryConfig } from "../ports/retry-config"
import type { RetryExecutor } from "../ports/retry-executor"
import type { RetryFn } from "../ports/retry-fn"

export type RetryExecutorDeps = {
  clock: Clock
}

export function createRetryExecutor(deps: RetryExecutorDeps): RetryExecutor {
  return new DefaultRetryExecutor(deps)
}

type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: unknown }

class DefaultRetryExecutor implements RetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async execute<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<T> {
    this.validateConfig(config)

    const { maxAttempts, observer, signal, errorPredicate } = config
    const startedAt = this.deps.clock.nowMs()

    if (signal?.aborted) {
      observer?.onAborted?.(this.buildContext(0, maxAttempts, startedAt, signal))
      throw createAbortError()
    }

    for (let attempt = 0; ; attempt++) {
      const ctx = this.buildContext(attempt, maxAttempts, startedAt, signal)

      observer?.onAttempt?.(ctx)

      const result = await this.tryAttempt(fn, ctx)

      if (result.ok) {
        observer?.onSuccess?.(result.value, ctx)
        return result.value
      }

      const { error } = result

      if (signal?.aborted) {
        observer?.onAborted?.(ctx)
        throw isAbortError(error) ? error : createAbortError()
      }

      const isLastAttempt = ctx.attemptsSoFar >= maxAttempts
      const shouldRetry =
        !isLastAttempt && (errorPredicate?.shouldRetry(error, ctx) ?? true)

      if (!shouldRetry) {
        observer?.onExhausted?.(error, this.buildAttemptInfo(ctx, null, true))
        throw error
      }

      const nextDelayMs = this.getDelayMs(config, error, ctx)
      observer?.onRetry?.(error, this.buildAttemptInfo(ctx, nextDelayMs, false))

      if (await this.sleep(nextDelayMs, signal)) {
        observer?.onAborted?.(ctx)
        throw createAbortError()
      }
    }
  }

  private async tryAttempt<T>(
    fn: RetryFn<T>,
    ctx: AttemptContext,
  ): Promise<AttemptResult<T>> {
    try {
      return { ok: true, value: await fn(ctx) }
    } catch (error) {
      return { ok: false, error }
    }
  }

  private validateConfig(config: RetryConfig<unknown>): void {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(
        `maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`,
      )
    }
  }

  private getDelayMs<T>(
    config: RetryConfig<T>,
    error: unknown,
    ctx: AttemptContext,
  ): number {
    const hinted = config.delayHint?.delayFor(error, ctx)
    if (hinted !== undefined && Number.isFinite(hinted) && hinted >= 0) {
      return hinted
    }

    return config.delay.getDelay(ctx.attempt).milliseconds
  }

  private buildContext(
    attempt: number,
    maxAttempts: number,
    startedAt: number,
    signal?: AbortSignal,
  ): AttemptContext {
    return {
      attempt,
      attemptsSoFar: attempt + 1,
      maxAttempts,
      startedAt,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
      ...(signal && { signal }),
    }
  }

  private buildAttemptInfo(
    ctx: AttemptContext,
    nextDelayMs: number | null,
    isLastAttempt: boolean,
  ): RetryAttemptInfo {
    return { ...ctx, nextDelayMs, isLastAttempt }
  }

  /** Resolves true when the signal interrupted the sleep. */
  private async sleep(delayMs: number, signal: AbortSignal | undefined): Promise<boolean> {
    if (delayMs <= 0) return signal?.aborted ?? false

    try {
      await this.deps.clock.sleep(delayMs, signal)
      return false
    } catch (error) {
      if (isAbortError(error)) {
        return true
      }
      throw error
    }
  }
}

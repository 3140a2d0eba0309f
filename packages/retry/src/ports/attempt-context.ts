import type { Milliseconds, UnixMs } from "@renderscreenshot/clock"

export interface AttemptContext {
  /** 0-indexed attempt number */
  attempt: number

  /** Total attempts so far (attempt + 1) */
  attemptsSoFar: number

  /** Total attempts allowed */
  maxAttempts: number

  /** Epoch ms when first attempt started */
  startedAt: UnixMs

  /** ms since first attempt started */
  elapsedMs: Milliseconds

  signal?: AbortSignal
}

export interface RetryAttemptInfo extends AttemptContext {
  /** ms until next attempt, null if exhausted */
  nextDelayMs: Milliseconds | null

  isLastAttempt: boolean
}

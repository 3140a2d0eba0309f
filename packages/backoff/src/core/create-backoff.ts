import type { Delay, DelayPolicy } from "../ports/delay-policy"
import type { JitterStrategy } from "../ports/jitter-strategy"

function sanitize(ms: number, minMs: number, maxMs: number): number {
  if (ms === Number.POSITIVE_INFINITY) return maxMs
  return Number.isFinite(ms) && ms >= 0 ? ms : minMs
}

function clamp(ms: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, ms))
}

function validateBounds(min: Delay, max: Delay): { minMs: number; maxMs: number } {
  const minMs = min.milliseconds
  const maxMs = max.milliseconds

  if (!Number.isFinite(minMs) || minMs < 0) {
    throw new RangeError(`min.milliseconds must be finite and >= 0 (got ${minMs})`)
  }

  if (!Number.isFinite(maxMs) || maxMs < 0) {
    throw new RangeError(`max.milliseconds must be finite and >= 0 (got ${maxMs})`)
  }

  if (maxMs < minMs) {
    throw new RangeError(
      `max.milliseconds must be >= min.milliseconds (got ${maxMs} < ${minMs})`,
    )
  }

  return { minMs, maxMs }
}

export type CreateBackoffOptions = {
  delay: DelayPolicy
  jitter?: JitterStrategy

  /** Floor for delay. Must be finite, non-negative. */
  min: Delay

  /** Ceiling for delay, applied after jitter. Must be finite, non-negative, >= min. */
  max: Delay
}

export type CreateBackoffFn = (options: CreateBackoffOptions) => DelayPolicy

/**
 * Composes a strategy and optional jitter into a DelayPolicy whose output is
 * always a finite, non-negative, whole number of milliseconds within [min, max].
 *
 * Overflowing growth (`+Infinity`) saturates at `max`; NaN and negative values
 * fall back to `min`.
 */
export const createBackoff: CreateBackoffFn = (
  options: CreateBackoffOptions,
): DelayPolicy => {
  const { delay, jitter, min, max } = options

  const { minMs, maxMs } = validateBounds(min, max)

  return {
    getDelay(attempt: number): Delay {
      const raw = delay.getDelay(attempt)
      const jittered = jitter ? jitter.apply(raw) : raw
      const sanitized = sanitize(jittered.milliseconds, minMs, maxMs)

      return { milliseconds: Math.floor(clamp(sanitized, minMs, maxMs)) }
    },
  }
}

import { systemRandom } from "../../adapters/random"
import type { Delay } from "../../ports/delay-policy"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

export interface AdditiveJitterOptions {
  /** Upper bound (exclusive) of the random amount added to each delay */
  spread: Delay
}

/**
 * Additive jitter: the delay plus a random value in `[0, spread)`.
 *
 * Never shortens the underlying delay, so exponential growth is preserved.
 */
export function additiveJitter(
  options: AdditiveJitterOptions,
  random: RandomSource = systemRandom,
): JitterStrategy {
  const spreadMs = options.spread.milliseconds

  return {
    apply(delay: Delay): Delay {
      return { milliseconds: delay.milliseconds + random.next() * spreadMs }
    },
  }
}

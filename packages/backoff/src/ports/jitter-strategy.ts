import type { Delay } from "./delay-policy"

/**
 * Adds randomness so that clients failing together do not retry together.
 * Output is not trusted; `createBackoff` sanitizes it.
 */
export interface JitterStrategy {
  apply(delay: Delay): Delay
}

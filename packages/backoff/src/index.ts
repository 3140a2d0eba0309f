export { systemRandom } from "./adapters/random"
export {
  type CreateBackoffFn,
  type CreateBackoffOptions,
  createBackoff,
} from "./core/create-backoff"
export { type AdditiveJitterOptions, additiveJitter } from "./core/jitter/additive"
export { type ExponentialOptions, exponential } from "./core/strategies/exponential"
export type { Delay, DelayPolicy } from "./ports/delay-policy"
export type { JitterStrategy } from "./ports/jitter-strategy"
export type { RandomSource } from "./ports/random-source"

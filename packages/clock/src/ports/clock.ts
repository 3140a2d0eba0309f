import type { Milliseconds, UnixMs, UnixSeconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` or `nowSeconds()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs

  /** Current time as whole seconds since Unix epoch (floored). */
  nowSeconds(): UnixSeconds
}

export interface Sleeper {
  /**
   * Delay execution for `ms` milliseconds.
   *
   * Rejects with an `AbortError` DOMException if `signal` is already aborted
   * or fires before the delay elapses.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper

import { createAbortError } from "../core/abort"
import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs, UnixSeconds } from "../ports/time"

export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  nowSeconds(): UnixSeconds {
    return Math.floor(this.time / 1000)
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  /** Sleep resolves immediately (no timers) unless the signal is already aborted. */
  async sleep(_ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw createAbortError()
  }
}

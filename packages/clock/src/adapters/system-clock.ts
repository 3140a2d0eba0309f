import { createAbortError } from "../core/abort"
import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs, UnixSeconds } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  nowSeconds(): UnixSeconds {
    return Math.floor(Date.now() / 1000)
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(createAbortError())
    if (ms <= 0) return Promise.resolve()

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer)
        reject(createAbortError())
      }

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }, ms)

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}

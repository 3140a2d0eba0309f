import type { RandomSource } from "@renderscreenshot/backoff"
import { FakeClock, type Milliseconds } from "@renderscreenshot/clock"
import type { Hono } from "hono"

/** FakeClock that records sleeps and can abort on the next one. */
export class TestClock extends FakeClock {
  sleepCalls: Milliseconds[] = []
  private abortController: AbortController | null = null

  override async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    this.sleepCalls.push(ms)

    if (this.abortController) {
      this.abortController.abort()
    }
    if (signal?.aborted) {
      throw new DOMException("Aborted", "AbortError")
    }

    this.advance(ms)
  }

  abortOnNextSleep(controller: AbortController): void {
    this.abortController = controller
  }
}

export const fixedRandom = (value: number): RandomSource => ({
  next: () => value,
})

/** Routes fetch calls into an in-process Hono app. */
export function fetchFrom(app: Hono): typeof fetch {
  return async (input, init) => app.request(input, init)
}

/** A fetch that never answers on its own; it rejects only when its signal fires. */
export const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal
    if (!signal) return
    signal.addEventListener("abort", () => reject(signal.reason), { once: true })
  })

export const TEST_BASE_URL = "http://api.test"

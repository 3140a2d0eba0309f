import { isAbortError } from "../../core/abort"
import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  describe("sleep", () => {
    it("resolves after ms elapses", async () => {
      const clock = new SystemClock()
      const start = Date.now()
      await clock.sleep(50)

      expect(Date.now() - start).toBeGreaterThanOrEqual(45)
    })

    it("rejects early when signal is aborted mid-sleep", async () => {
      const clock = new SystemClock()
      const ac = new AbortController()

      const start = Date.now()
      const p = clock.sleep(5000, ac.signal)
      setTimeout(() => ac.abort(), 50)

      const err = await p.catch((e: unknown) => e)

      expect(isAbortError(err)).toBe(true)
      expect(Date.now() - start).toBeLessThan(500)
    })

    it("clears timeout when aborted", async () => {
      const clearTimeoutSpy = vi.spyOn(globalThis, "clearTimeout")
      const clock = new SystemClock()
      const ac = new AbortController()

      const p = clock.sleep(5000, ac.signal)
      ac.abort()
      await p.catch(() => undefined)

      expect(clearTimeoutSpy).toHaveBeenCalled()
    })

    it("removes abort listener after normal completion", async () => {
      const clock = new SystemClock()
      const ac = new AbortController()
      const removeSpy = vi.spyOn(ac.signal, "removeEventListener")

      await clock.sleep(10, ac.signal)

      expect(removeSpy).toHaveBeenCalledWith("abort", expect.any(Function))
    })
  })
})

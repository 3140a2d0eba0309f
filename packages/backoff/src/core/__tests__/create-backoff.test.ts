import type { DelayPolicy } from "../../ports/delay-policy"
import type { RandomSource } from "../../ports/random-source"
import { createBackoff } from "../create-backoff"
import { additiveJitter } from "../jitter/additive"
import { exponential } from "../strategies/exponential"

const fixedRandom = (value: number): RandomSource => ({
  next: () => value,
})

const fixed = (milliseconds: number): DelayPolicy => ({
  getDelay: () => ({ milliseconds }),
})

describe("createBackoff", () => {
  it("passes through exponential growth", () => {
    const policy = createBackoff({
      delay: exponential({ base: { milliseconds: 100 } }),
      min: { milliseconds: 0 },
      max: { milliseconds: 10000 },
    })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 100 })
    expect(policy.getDelay(1)).toEqual({ milliseconds: 200 })
    expect(policy.getDelay(2)).toEqual({ milliseconds: 400 })
  })

  it("composes exponential growth with additive jitter", () => {
    const policy = createBackoff({
      delay: exponential({ base: { milliseconds: 1000 } }),
      jitter: additiveJitter({ spread: { milliseconds: 500 } }, fixedRandom(0.5)),
      min: { milliseconds: 0 },
      max: { milliseconds: 30000 },
    })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 1250 })
    expect(policy.getDelay(1)).toEqual({ milliseconds: 2250 })
    expect(policy.getDelay(2)).toEqual({ milliseconds: 4250 })
  })

  it("floors fractional delays", () => {
    const policy = createBackoff({
      delay: exponential({ base: { milliseconds: 10 } }),
      jitter: additiveJitter({ spread: { milliseconds: 5 } }, fixedRandom(0.5)),
      min: { milliseconds: 0 },
      max: { milliseconds: 1000 },
    })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 12 })
  })

  it("caps at max after jitter", () => {
    const policy = createBackoff({
      delay: exponential({ base: { milliseconds: 1000 } }),
      jitter: additiveJitter({ spread: { milliseconds: 500 } }, fixedRandom(0.9)),
      min: { milliseconds: 0 },
      max: { milliseconds: 30000 },
    })

    expect(policy.getDelay(5)).toEqual({ milliseconds: 30000 })
    expect(policy.getDelay(12)).toEqual({ milliseconds: 30000 })
  })

  it("saturates overflowing growth at max", () => {
    const policy = createBackoff({
      delay: exponential({ base: { milliseconds: 1000 } }),
      min: { milliseconds: 0 },
      max: { milliseconds: 30000 },
    })

    expect(policy.getDelay(2000)).toEqual({ milliseconds: 30000 })
  })

  it("raises delays below min to min", () => {
    const policy = createBackoff({
      delay: fixed(5),
      min: { milliseconds: 50 },
      max: { milliseconds: 100 },
    })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 50 })
  })

  it.each([Number.NaN, -10, Number.NEGATIVE_INFINITY])(
    "falls back to min for %s",
    (value) => {
      const policy = createBackoff({
        delay: fixed(value),
        min: { milliseconds: 20 },
        max: { milliseconds: 100 },
      })

      expect(policy.getDelay(0)).toEqual({ milliseconds: 20 })
    },
  )

  describe("bounds validation", () => {
    it("rejects negative min", () => {
      expect(() =>
        createBackoff({
          delay: fixed(1),
          min: { milliseconds: -1 },
          max: { milliseconds: 10 },
        }),
      ).toThrow("min.milliseconds must be finite and >= 0 (got -1)")
    })

    it("rejects non-finite max", () => {
      expect(() =>
        createBackoff({
          delay: fixed(1),
          min: { milliseconds: 0 },
          max: { milliseconds: Number.POSITIVE_INFINITY },
        }),
      ).toThrow(RangeError)
    })

    it("rejects max below min", () => {
      expect(() =>
        createBackoff({
          delay: fixed(1),
          min: { milliseconds: 10 },
          max: { milliseconds: 5 },
        }),
      ).toThrow("max.milliseconds must be >= min.milliseconds (got 5 < 10)")
    })
  })
})

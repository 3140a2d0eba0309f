import { systemRandom } from "../random"

describe("systemRandom", () => {
  it("returns a finite number in [0, 1)", () => {
    for (let i = 0; i < 1000; i++) {
      const value = systemRandom.next()

      expect(Number.isFinite(value)).toBe(true)
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })

  it("delegates to Math.random", () => {
    const spy = vi.spyOn(Math, "random").mockReturnValue(0.25)

    expect(systemRandom.next()).toBe(0.25)
    spy.mockRestore()
  })
})

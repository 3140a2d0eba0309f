import { stripPrefix } from "../strip-prefix"

describe("stripPrefix", () => {
  it("copies everything for an empty prefix", () => {
    const values = { A: "1" }
    const result = stripPrefix(values, "")

    expect(result).toEqual({ A: "1" })
    expect(result).not.toBe(values)
  })

  it("drops a key equal to the bare prefix", () => {
    expect(stripPrefix({ APP_: "x", APP_PORT: "80", PORT: "81" }, "APP_")).toEqual({
      PORT: "80",
    })
  })
})

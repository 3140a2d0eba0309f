import { ApiError } from "../../errors/api-error"
import {
  buildSignedUrl,
  canonicalQuery,
  queryEscape,
  signCanonical,
  type SignParamsInput,
  signParams,
} from "../request-signer"

const input = {
  params: { url: "https://example.com", width: "1280" },
  expiresAt: new Date(1_700_000_000_000),
  keyId: "rs_pub_test",
  secret: "test-secret",
}

const EXPECTED_QUERY =
  "expires=1700000000&key_id=rs_pub_test&url=https%3A%2F%2Fexample.com&width=1280"
const EXPECTED_SIGNATURE = "b0a31a335f2b3b56eeb874eed52b1c77bff0b698d98c2e752abadbfadc2a53b2"

describe("queryEscape", () => {
  it("form-encodes everything but unreserved characters", () => {
    expect(queryEscape("a b!*'()~é/")).toBe("a+b%21%2A%27%28%29~%C3%A9%2F")
  })

  it("passes unreserved characters through", () => {
    expect(queryEscape("AZaz09-_.~")).toBe("AZaz09-_.~")
  })
})

describe("canonicalQuery", () => {
  it("sorts keys and escapes values", () => {
    expect(canonicalQuery({ width: "1280", format: "png", url: "a&b" })).toBe(
      "format=png&url=a%26b&width=1280",
    )
  })

  it("is empty for no params", () => {
    expect(canonicalQuery({})).toBe("")
  })
})

describe("signParams", () => {
  it("adds expiry and key id, then signs the canonical query", () => {
    expect(signParams(input)).toEqual({ query: EXPECTED_QUERY, signature: EXPECTED_SIGNATURE })
  })

  it("is independent of parameter insertion order", () => {
    const reordered = signParams({
      ...input,
      params: { width: "1280", url: "https://example.com" },
    })

    expect(reordered.signature).toBe(EXPECTED_SIGNATURE)
  })

  it.each<[string, Partial<SignParamsInput>]>([
    ["a param value", { params: { url: "https://example.org", width: "1280" } }],
    ["the expiry", { expiresAt: new Date(1_700_000_001_000) }],
    ["the key id", { keyId: "rs_pub_other" }],
    ["the secret", { secret: "other-secret" }],
  ])("changes when %s changes", (_label, change) => {
    expect(signParams({ ...input, ...change }).signature).not.toBe(EXPECTED_SIGNATURE)
  })

  it("truncates the expiry to whole seconds", () => {
    expect(signParams({ ...input, expiresAt: new Date(1_700_000_000_999) }).signature).toBe(
      EXPECTED_SIGNATURE,
    )
  })

  it("does not let params override expires or key_id", () => {
    const signed = signParams({
      ...input,
      params: { ...input.params, expires: "9999999999", key_id: "rs_pub_evil" },
    })

    expect(signed.query).toBe(EXPECTED_QUERY)
  })

  it.each<[string, Partial<SignParamsInput>]>([
    ["secret", { secret: "" }],
    ["key id", { keyId: "" }],
  ])("throws invalid_request when the %s is missing", (_label, change) => {
    let caught: unknown
    try {
      signParams({ ...input, ...change })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(ApiError)
    expect(caught).toMatchObject({ code: "invalid_request", httpStatus: 400 })
    if (caught instanceof ApiError) {
      expect(caught.message).toContain("signingKey")
      expect(caught.message).toContain("publicKeyId")
    }
  })
})

describe("signCanonical", () => {
  it("returns lowercase hex HMAC-SHA256", () => {
    expect(signCanonical(EXPECTED_QUERY, "test-secret")).toBe(EXPECTED_SIGNATURE)
  })
})

describe("buildSignedUrl", () => {
  it("appends the signature to the screenshot path", () => {
    expect(buildSignedUrl({ ...input, baseUrl: "https://api.renderscreenshot.com/" })).toBe(
      `https://api.renderscreenshot.com/v1/screenshot?${EXPECTED_QUERY}&signature=${EXPECTED_SIGNATURE}`,
    )
  })

  it("accepts a custom path", () => {
    expect(buildSignedUrl({ ...input, baseUrl: "http://api.test", path: "/v2/render" })).toBe(
      `http://api.test/v2/render?${EXPECTED_QUERY}&signature=${EXPECTED_SIGNATURE}`,
    )
  })
})

import { createHmac } from "node:crypto"
import { ApiError } from "../errors/api-error"

export const DEFAULT_SIGNED_PATH = "/v1/screenshot"

const MISSING_CREDENTIALS =
  "Signed URLs require signingKey (rs_secret_*) and publicKeyId (rs_pub_*). " +
  "Pass them to the client options or to generateUrl directly."

export type SignParamsInput = {
  params: Readonly<Record<string, string>>
  expiresAt: Date
  /** Public key id (rs_pub_*) */
  keyId: string
  /** Signing secret (rs_secret_*) */
  secret: string
}

export type SignedQuery = {
  query: string
  signature: string
}

export type BuildSignedUrlInput = SignParamsInput & {
  baseUrl: string
  path?: string
}

function isUnreserved(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x41 && byte <= 0x5a) ||
    (byte >= 0x61 && byte <= 0x7a) ||
    byte === 0x2d ||
    byte === 0x2e ||
    byte === 0x5f ||
    byte === 0x7e
  )
}

/**
 * Form-style escaping: unreserved characters pass through, space becomes `+`,
 * every other UTF-8 byte becomes `%XX` with uppercase hex.
 */
export function queryEscape(value: string): string {
  let out = ""

  for (const byte of Buffer.from(value, "utf8")) {
    if (isUnreserved(byte)) {
      out += String.fromCharCode(byte)
    } else if (byte === 0x20) {
      out += "+"
    } else {
      out += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`
    }
  }

  return out
}

/** `k1=v1&k2=v2` with keys sorted; values escaped, keys as-is. */
export function canonicalQuery(params: Readonly<Record<string, string>>): string {
  return Object.keys(params)
    .sort()
    .map((key) => `${key}=${queryEscape(params[key] ?? "")}`)
    .join("&")
}

/** Lowercase hex HMAC-SHA256 of the canonical query. */
export function signCanonical(query: string, secret: string): string {
  return createHmac("sha256", secret).update(query).digest("hex")
}

export function signParams(input: SignParamsInput): SignedQuery {
  const { params, expiresAt, keyId, secret } = input

  if (!secret || !keyId) {
    throw ApiError.invalidRequest(MISSING_CREDENTIALS, 400)
  }

  const query = canonicalQuery({
    ...params,
    expires: String(Math.floor(expiresAt.getTime() / 1000)),
    key_id: keyId,
  })

  return { query, signature: signCanonical(query, secret) }
}

/** `<baseUrl><path>?<query>&signature=<hex>` */
export function buildSignedUrl(input: BuildSignedUrlInput): string {
  const { baseUrl, path = DEFAULT_SIGNED_PATH } = input
  const { query, signature } = signParams(input)

  return `${baseUrl.replace(/\/+$/, "")}${path}?${query}&signature=${signature}`
}

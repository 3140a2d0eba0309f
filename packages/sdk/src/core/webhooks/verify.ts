import { createHmac, timingSafeEqual } from "node:crypto"
import { SystemClock, type TimeSource } from "@renderscreenshot/clock"
import { DEFAULT_WEBHOOK_TOLERANCE } from "./constants"

export type VerifyWebhookInput = {
  /** Raw request body, exactly as received */
  payload: string
  /** `sha256=<hex>` */
  signature: string
  /** Unix seconds, as sent */
  timestamp: string
  secret: string
  /** Seconds; 0 or absent means the default */
  toleranceSeconds?: number
}

const timestampPattern = /^[+-]?\d+$/

/** `sha256=` + hex HMAC-SHA256 of `<timestamp>.<payload>` */
export function computeWebhookSignature(
  payload: string,
  timestamp: string,
  secret: string,
): string {
  const digest = createHmac("sha256", secret).update(`${timestamp}.${payload}`).digest("hex")
  return `sha256=${digest}`
}

/**
 * Checks a webhook's signature and freshness. Returns false for any malformed
 * input; never throws.
 */
export function verifyWebhook(
  input: VerifyWebhookInput,
  clock: TimeSource = new SystemClock(),
): boolean {
  const { payload, signature, timestamp, secret } = input

  if (!payload || !signature || !timestamp || !secret) return false
  if (!timestampPattern.test(timestamp)) return false

  const ts = Number(timestamp)
  if (!Number.isSafeInteger(ts)) return false

  const tolerance = input.toleranceSeconds || DEFAULT_WEBHOOK_TOLERANCE
  if (Math.abs(clock.nowSeconds() - ts) > tolerance) return false

  const expected = Buffer.from(computeWebhookSignature(payload, timestamp, secret))
  const actual = Buffer.from(signature)

  return expected.length === actual.length && timingSafeEqual(expected, actual)
}

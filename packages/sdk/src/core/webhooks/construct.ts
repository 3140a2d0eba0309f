import type { TimeSource } from "@renderscreenshot/clock"
import type { HeaderInput, WebhookEvent } from "../../ports/webhook"
import { ApiError } from "../errors/api-error"
import { extractWebhookHeaders } from "./extract-headers"
import { parseWebhook } from "./parse"
import { verifyWebhook } from "./verify"

export type ConstructWebhookEventInput = {
  payload: string
  headers: HeaderInput
  secret: string
  toleranceSeconds?: number
}

/** Verifies then parses an incoming webhook request. */
export function constructWebhookEvent(
  input: ConstructWebhookEventInput,
  clock?: TimeSource,
): WebhookEvent {
  const { signature, timestamp } = extractWebhookHeaders(input.headers)

  const valid = verifyWebhook(
    {
      payload: input.payload,
      signature,
      timestamp,
      secret: input.secret,
      ...(input.toleranceSeconds !== undefined && { toleranceSeconds: input.toleranceSeconds }),
    },
    clock,
  )

  if (!valid) {
    throw ApiError.unauthorized("Webhook signature verification failed", 0)
  }

  return parseWebhook(input.payload)
}

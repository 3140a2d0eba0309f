import { isJsonObject } from "../../ports/json"
import type { WebhookEvent } from "../../ports/webhook"
import { ApiError } from "../errors/api-error"

function invalidPayload(detail: string, cause?: unknown): ApiError {
  return ApiError.invalidRequest(`Invalid webhook payload: ${detail}`, 400, cause)
}

export function parseWebhook(payload: string): WebhookEvent {
  let document: unknown
  try {
    document = JSON.parse(payload)
  } catch (err) {
    throw invalidPayload(err instanceof Error ? err.message : String(err), err)
  }

  if (!isJsonObject(document)) {
    throw invalidPayload("expected a JSON object")
  }

  const { type, event, id, timestamp, data } = document

  return {
    event: typeof type === "string" ? type : typeof event === "string" ? event : "",
    id: typeof id === "string" ? id : "",
    timestamp: typeof timestamp === "number" ? Math.trunc(timestamp) : 0,
    data: isJsonObject(data) ? data : {},
  }
}

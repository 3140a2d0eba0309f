import type { HeaderInput, WebhookHeaders } from "../../ports/webhook"
import {
  WEBHOOK_ID_HEADER,
  WEBHOOK_SIGNATURE_HEADER,
  WEBHOOK_TIMESTAMP_HEADER,
} from "./constants"

function normalizeName(name: string): string {
  return name.toLowerCase().replaceAll("_", "-")
}

function normalize(headers: HeaderInput): Map<string, string> {
  const result = new Map<string, string>()
  const entries =
    headers instanceof Headers ? headers.entries() : Object.entries(headers)

  for (const [name, value] of entries) {
    if (value === undefined) continue
    result.set(normalizeName(name), Array.isArray(value) ? (value[0] ?? "") : value)
  }

  return result
}

/**
 * Reads the webhook headers under any casing, with `_` accepted for `-`.
 * Missing headers come back as "".
 */
export function extractWebhookHeaders(headers: HeaderInput): WebhookHeaders {
  const normalized = normalize(headers)
  const read = (name: string) => normalized.get(normalizeName(name)) ?? ""

  return {
    signature: read(WEBHOOK_SIGNATURE_HEADER),
    timestamp: read(WEBHOOK_TIMESTAMP_HEADER),
    id: read(WEBHOOK_ID_HEADER),
  }
}

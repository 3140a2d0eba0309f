import type { JsonObject } from "./json"

export type WebhookEvent = {
  /** e.g. "screenshot.completed", "batch.completed" */
  event: string
  id: string
  /** Unix seconds */
  timestamp: number
  data: JsonObject
}

export type WebhookHeaders = {
  signature: string
  timestamp: string
  id: string
}

export type HeaderInput = Headers | Record<string, string | string[] | undefined>

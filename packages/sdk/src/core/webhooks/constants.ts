export const WEBHOOK_SIGNATURE_HEADER = "X-Webhook-Signature"
export const WEBHOOK_TIMESTAMP_HEADER = "X-Webhook-Timestamp"
export const WEBHOOK_ID_HEADER = "X-Webhook-ID"

/** Seconds */
export const DEFAULT_WEBHOOK_TOLERANCE = 300

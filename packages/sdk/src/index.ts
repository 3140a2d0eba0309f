export { createClientLogger } from "./adapters/create-client-logger"
export {
  type ClientSettings,
  type LoadClientOptionsInput,
  loadClientOptions,
  mapEnvToSettings,
} from "./adapters/load-client-options"
export { CacheManager } from "./core/client/cache-manager"
export {
  type BatchRequest,
  type GenerateUrlOptions,
  RenderScreenshotClient,
  type ScreenshotParams,
} from "./core/client/client"
export type { ClientOptions, ClientOptionsInput } from "./core/client/client-options"
export { ApiError, type ApiErrorInit } from "./core/errors/api-error"
export { classifyResponse, type ErrorResponse, parseRetryAfter } from "./core/errors/classify"
export { type ApiErrorCode, type ErrorCode, errorCodes } from "./core/errors/error-codes"
export {
  isApiError,
  isAuthenticationError,
  isNotFound,
  isRateLimited,
  isRetryableError,
  isValidationError,
} from "./core/errors/predicates"
export {
  type BuildSignedUrlInput,
  buildSignedUrl,
  canonicalQuery,
  DEFAULT_SIGNED_PATH,
  queryEscape,
  type SignedQuery,
  type SignParamsInput,
  signCanonical,
  signParams,
} from "./core/signing/request-signer"
export {
  createHttpTransport,
  FetchHttpTransport,
  type HttpTransportDeps,
} from "./core/transport/http-transport"
export {
  DEFAULT_BASE_URL,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  MAX_RETRY_DELAY_MS,
  type TransportOptions,
  type TransportOptionsInput,
} from "./core/transport/transport-options"
export {
  DEFAULT_WEBHOOK_TOLERANCE,
  WEBHOOK_ID_HEADER,
  WEBHOOK_SIGNATURE_HEADER,
  WEBHOOK_TIMESTAMP_HEADER,
} from "./core/webhooks/constants"
export {
  type ConstructWebhookEventInput,
  constructWebhookEvent,
} from "./core/webhooks/construct"
export { extractWebhookHeaders } from "./core/webhooks/extract-headers"
export { parseWebhook } from "./core/webhooks/parse"
export {
  computeWebhookSignature,
  type VerifyWebhookInput,
  verifyWebhook,
} from "./core/webhooks/verify"
export { isJsonObject, type JsonObject, type JsonValue } from "./ports/json"
export type {
  BinaryResponse,
  BodyRequestOptions,
  HttpTransport,
  QueryRequestOptions,
  RequestOptions,
} from "./ports/transport"
export type { HeaderInput, WebhookEvent, WebhookHeaders } from "./ports/webhook"
export { DEFAULT_USER_AGENT, SDK_VERSION } from "./version"

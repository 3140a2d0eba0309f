import { z } from "zod"
import { DEFAULT_USER_AGENT } from "../../version"
import { ApiError } from "../errors/api-error"

export const DEFAULT_BASE_URL = "https://api.renderscreenshot.com"
export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_RETRY_DELAY_MS = 1_000
export const MAX_RETRY_DELAY_MS = 30_000

export const transportOptionsSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((url) => url.replace(/\/+$/, "")),
  /** 0 means the default */
  timeoutMs: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_TIMEOUT_MS)
    .transform((ms) => ms || DEFAULT_TIMEOUT_MS),
  maxRetries: z.number().int().nonnegative().default(0),
  /** 0 means the default */
  retryDelayMs: z
    .number()
    .nonnegative()
    .default(DEFAULT_RETRY_DELAY_MS)
    .transform((ms) => ms || DEFAULT_RETRY_DELAY_MS),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
})

export type TransportOptionsInput = z.input<typeof transportOptionsSchema>
export type TransportOptions = Readonly<z.output<typeof transportOptionsSchema>>

/**
 * Parses options against `schema`. A missing or empty `apiKey` is reported as
 * an authentication failure, anything else as an invalid request.
 */
export function parseOptions<S extends z.ZodType<object>>(
  schema: S,
  input: unknown,
): Readonly<z.output<S>> {
  const result = schema.safeParse(input)

  if (result.success) {
    return Object.freeze(result.data)
  }

  if (result.error.issues.some((issue) => issue.path[0] === "apiKey")) {
    throw ApiError.unauthorized("Invalid or missing API key", 401)
  }

  throw ApiError.invalidRequest(`Invalid options:\n${z.prettifyError(result.error)}`, 0)
}

import { logLevelNames } from "@renderscreenshot/logger"
import { z } from "zod"

/** Variables read after stripping the `RENDERSCREENSHOT_` prefix. */
export const envSchema = z.object({
  API_KEY: z.string().default(""),
  BASE_URL: z.url().optional(),
  TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  MAX_RETRIES: z.coerce.number().int().nonnegative().optional(),
  RETRY_DELAY_MS: z.coerce.number().nonnegative().optional(),
  SIGNING_KEY: z.string().optional(),
  PUBLIC_KEY_ID: z.string().optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type EnvConfig = z.output<typeof envSchema>

export const ENV_PREFIX = "RENDERSCREENSHOT_"

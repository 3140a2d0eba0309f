import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@renderscreenshot/config"
import type { LoggerOptions } from "@renderscreenshot/logger"
import type { ClientOptionsInput } from "../core/client/client-options"
import { ENV_PREFIX, type EnvConfig, envSchema } from "./env-schema"

export type LoadClientOptionsInput = {
  /** @default process.env */
  env?: Record<string, string | undefined>
  /** @default process.cwd() */
  cwd?: string
  /** Optional dotenv file read before the environment. @default ".env" */
  dotenvFile?: string
}

export type ClientSettings = {
  client: ClientOptionsInput
  logging: LoggerOptions
}

export function mapEnvToSettings(env: EnvConfig): ClientSettings {
  return {
    client: {
      apiKey: env.API_KEY,
      ...(env.BASE_URL !== undefined && { baseUrl: env.BASE_URL }),
      ...(env.TIMEOUT_MS !== undefined && { timeoutMs: env.TIMEOUT_MS }),
      ...(env.MAX_RETRIES !== undefined && { maxRetries: env.MAX_RETRIES }),
      ...(env.RETRY_DELAY_MS !== undefined && { retryDelayMs: env.RETRY_DELAY_MS }),
      ...(env.SIGNING_KEY !== undefined && { signingKey: env.SIGNING_KEY }),
      ...(env.PUBLIC_KEY_ID !== undefined && { publicKeyId: env.PUBLIC_KEY_ID }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Reads `RENDERSCREENSHOT_*` settings from an optional dotenv file, then the
 * environment (which wins).
 */
export async function loadClientOptions(
  input: LoadClientOptionsInput = {},
): Promise<ClientSettings> {
  const sources: ConfigSource[] = [
    new DotenvSource({
      file: input.dotenvFile ?? ".env",
      required: false,
      prefix: ENV_PREFIX,
      ...(input.cwd !== undefined && { cwd: input.cwd }),
    }),
    new EnvSource({ prefix: ENV_PREFIX, ...(input.env && { env: input.env }) }),
  ]

  const config = await loadConfig({ schema: envSchema, sources })

  return mapEnvToSettings(config.value)
}


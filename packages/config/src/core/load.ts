import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { Config } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { ResolvedConfig } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Default: a single EnvSource over process.env */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<Config<T>> {
  const merged: Record<string, unknown> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigError(
      z.prettifyError(result.error),
      resolvedSources.map((s) => s.name),
    )
  }

  return new ResolvedConfig<T>(result.data)
}

/**
 * Validated configuration.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     TIMEOUT_MS: z.coerce.number().default(30000),
 *     API_KEY: z.string(),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("TIMEOUT_MS") // 30000
 * ```
 */
export interface Config<T extends Record<string, unknown>> {
  /** Full validated config object, frozen */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]
}

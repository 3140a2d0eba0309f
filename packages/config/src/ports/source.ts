/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and coercion happen downstream, and sources
 * are applied in order with later ones overriding earlier ones.
 */
export interface ConfigSource {
  /** e.g. "env", "dotenv:.env" */
  readonly name: string

  /** An `undefined` value means "not provided". */
  load(): Promise<Record<string, unknown>>
}

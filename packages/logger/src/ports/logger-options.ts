import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to implement them however they like.
 */
export type LoggerOptions = {
  /** Minimum log level to emit. */
  level: LogLevelName

  /**
   * Pretty-print output for humans.
   *
   * @remarks
   * Intended for local development; keep JSON output in production.
   * Ignored when an explicit destination stream is supplied.
   */
  prettify?: boolean
}

import { type Logger, type LoggerOptions, PinoLogger, type PinoLoggerDeps } from "@renderscreenshot/logger"

/** A pino-backed logger tagged with the SDK's service name. */
export function createClientLogger(
  options: LoggerOptions,
  deps: PinoLoggerDeps = {},
): Logger {
  return new PinoLogger(deps, options, { service: "renderscreenshot" })
}

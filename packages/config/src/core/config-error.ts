import { BaseError } from "@renderscreenshot/errors"

export class ConfigError extends BaseError<"config_invalid"> {
  constructor(issues: string, sources: string[]) {
    super(`Configuration validation failed:\n${issues}`, {
      code: "config_invalid",
      context: { sources },
    })
  }
}

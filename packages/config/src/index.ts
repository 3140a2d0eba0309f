export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ConfigError } from "./core/config-error"
export { ResolvedConfig } from "./core/config"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { Config } from "./ports/config"
export type { ConfigSource } from "./ports/source"

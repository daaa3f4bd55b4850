export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { applyOverrides, type DeepPartial } from "./core/apply-overrides"
export { Config } from "./core/config"
export { type ConfigIssue, ConfigValidationError } from "./core/config-error"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export type { TypedConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"

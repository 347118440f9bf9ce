export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource, type ObjectSourceOptions } from "./adapters/object/object-source"
export { Config } from "./core/config"
export { ConfigError, type ConfigErrorCode } from "./core/config-error"
export { type LoadConfigFn, type LoadConfigOptions, loadConfig } from "./core/load"
export { saveJsonConfig } from "./core/save"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"

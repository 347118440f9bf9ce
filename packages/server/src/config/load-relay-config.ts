import {
  type ConfigSource,
  ConfigError,
  DotenvSource,
  EnvSource,
  type IConfig,
  JsonSource,
  loadConfig,
  ObjectSource,
  saveJsonConfig,
} from "@mailrelay/config"
import type { Logger } from "@mailrelay/logger"
import { defaultRelayConfig, type RelayConfig, relayConfigSchema } from "./relay-config"

export const ENV_PREFIX = "MAILRELAY_"
export const ENV_DELIMITER = "__"

export function defaultConfigFile(name: string): string {
  return `/usr/local/etc/${name}/${name}.json`
}

/** `MAILRELAY_CONFIG_FILE` when set, otherwise the per-program default. */
export function resolveConfigFile(
  name: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return env[`${ENV_PREFIX}CONFIG_FILE`] || defaultConfigFile(name)
}

export type LoadRelayConfigOptions = {
  /** Program name; selects the default file, log directory and log name. */
  name: string

  /** @default resolveConfigFile(name, env) */
  file?: string

  /**
   * Fail with `config_not_found` when the file is missing instead of using defaults.
   * Set for reloads.
   * @default false
   */
  requireFile?: boolean

  /**
   * Write the defaults to the file when it is missing. A failed write is logged and ignored.
   * @default false
   */
  persistDefaults?: boolean

  /** Applied last, after the environment. */
  overrides?: Record<string, unknown>

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** Directory the file and `.env` are resolved against. @default process.cwd() */
  cwd?: string

  /** Receives notes on defaults persistence and keys the schema does not know. */
  logger?: Logger
}

export type LoadedRelayConfig = {
  config: IConfig<RelayConfig>
  /** Absolute path of the configuration file. */
  file: string
  /** True when the defaults were written to `file` by this call. */
  created: boolean
}

/** Read by `resolveConfigFile`, so never reported as unknown. */
const CONFIG_FILE_KEY = "configFile"

/**
 * Defaults, then the JSON file, then `.env`, then `MAILRELAY_*` variables; validated as a
 * whole. Nothing is returned unless every field validates. Keys outside the schema are
 * dropped and reported to `logger` as a warning.
 *
 * @throws ConfigError
 */
export async function loadRelayConfig(options: LoadRelayConfigOptions): Promise<LoadedRelayConfig> {
  const env = options.env ?? process.env
  const cwd = options.cwd
  const json = new JsonSource({
    file: options.file ?? resolveConfigFile(options.name, env),
    required: true,
    ...(cwd && { cwd }),
  })

  const exists = await json.exists()

  if (!exists && options.requireFile) throw ConfigError.notFound(json.path)

  const defaults = defaultRelayConfig(options.name)
  const created = !exists && options.persistDefaults === true && (await persist(json.path, defaults, options.logger))

  const sources: ConfigSource[] = [
    new ObjectSource({ name: "defaults", values: defaults }),
    ...(exists ? [json] : []),
    new DotenvSource({
      file: ".env",
      required: false,
      prefix: ENV_PREFIX,
      delimiter: ENV_DELIMITER,
      ...(cwd && { cwd }),
    }),
    new EnvSource({ prefix: ENV_PREFIX, delimiter: ENV_DELIMITER, env }),
    ...(options.overrides ? [new ObjectSource({ name: "overrides", values: options.overrides })] : []),
  ]

  const config = await loadConfig({ schema: relayConfigSchema, sources })
  const unknownKeys = config.unknownKeys().filter((key) => key !== CONFIG_FILE_KEY)

  if (unknownKeys.length > 0) {
    options.logger?.warn("Unknown configuration keys ignored", {
      file: json.path,
      keys: unknownKeys,
    })
  }
  options.logger?.debug("Configuration loaded", { file: json.path, sources: config.sourcesUsed() })

  return { config, file: json.path, created }
}

async function persist(file: string, defaults: RelayConfig, logger?: Logger): Promise<boolean> {
  try {
    await saveJsonConfig(file, defaults)
    logger?.info("Default configuration written", { file })
    return true
  } catch (err) {
    logger?.warn("Failed to write default configuration", { file, err })
    return false
  }
}

export type LoadRelayConfigFn = typeof loadRelayConfig

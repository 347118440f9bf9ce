import { type ZodType, z } from "zod"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"
import { leafPaths, mergeInto, type Tree } from "./tree"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources: ConfigSource[]
}

/**
 * Load every source in order, deep-merge them and validate the result.
 *
 * @throws ConfigError `config_unreadable` when a source fails to load,
 * `config_invalid` when the merged document does not satisfy the schema.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Tree = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    let values: Record<string, unknown>

    try {
      values = await source.load()
    } catch (err) {
      throw ConfigError.unreadable(source.name, err)
    }

    mergeInto(merged, values, source.name, provenance)
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw ConfigError.invalid(z.prettifyError(result.error))
  }

  return new Config<T>(result.data, provenance, new Set(leafPaths(merged)))
}

export type LoadConfigFn = typeof loadConfig

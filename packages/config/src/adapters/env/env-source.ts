import type { ConfigSource } from "../../ports/source"
import { nestKeys } from "../../core/tree"

export type EnvSourceOptions = {
  /** Only keys starting with this prefix are read; the prefix is stripped. */
  prefix?: string

  /**
   * Splits keys into nested sections, e.g. with "__" `SMTP__AUTH_PASS` becomes
   * `{ smtp: { authPass } }`. Without it keys are returned as-is.
   */
  delimiter?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return selectKeys(this.env, this.options)
  }
}

export function selectKeys(
  vars: Record<string, string | undefined>,
  options: Pick<EnvSourceOptions, "prefix" | "delimiter">,
): Record<string, unknown> {
  const { prefix, delimiter } = options
  const selected: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(vars)) {
    if (prefix && !key.startsWith(prefix)) continue

    selected[prefix ? key.slice(prefix.length) : key] = value
  }

  return delimiter ? nestKeys(selected, delimiter) : selected
}

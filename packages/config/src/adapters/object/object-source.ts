import type { ConfigSource } from "../../ports/source"

export type ObjectSourceOptions = {
  /** @default "object" */
  name?: string
  values: Record<string, unknown>
}

/** In-memory values, typically built-in defaults or test overrides. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: ObjectSourceOptions) {
    this.name = opts.name ?? "object"
  }

  async load(): Promise<Record<string, unknown>> {
    return structuredClone(this.opts.values)
  }
}

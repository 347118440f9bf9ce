import type { IConfig } from "../ports/config"
import { deepFreeze, leafPaths } from "./tree"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: T

  constructor(
    data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly providedPaths: ReadonlySet<string>,
  ) {
    this.data = deepFreeze(data)
  }

  get value(): T {
    return this.data
  }

  explain(path: string): string {
    return this.provenance.get(path) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  unknownKeys(): string[] {
    const known = new Set(leafPaths(this.data))

    return [...this.providedPaths].filter((p) => !known.has(p))
  }
}

import fs from "node:fs/promises"
import path from "node:path"
import type { ConfigSource } from "../../ports/source"
import { isPlainObject } from "../../core/tree"

export type JsonSourceOptions = {
  /**
   * Path to the JSON file. Can be absolute or relative to `cwd`.
   *
   * @example "/usr/local/etc/mailrelayd/mailrelayd.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: load() rejects if the file is missing.
   * - `false`: load() returns an empty object if the file is missing.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

export class JsonSource implements ConfigSource {
  readonly name: string
  readonly path: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.path = path.resolve(opts.cwd ?? process.cwd(), opts.file)
    this.name = `json:${this.path}`
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.path)
      return true
    } catch (err) {
      if (isNotFound(err)) return false
      throw err
    }
  }

  async load(): Promise<Record<string, unknown>> {
    let content: string

    try {
      content = await fs.readFile(this.path, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}
      throw err
    }

    const parsed: unknown = JSON.parse(content)

    if (!isPlainObject(parsed)) {
      throw new TypeError(`${this.name}: top-level value must be an object`)
    }

    return parsed
  }
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
  )
}

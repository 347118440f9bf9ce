import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { selectKeys } from "../env/env-source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file. Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Returns empty config if file not found.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Same meaning as for EnvSource. */
  prefix?: string

  /** Same meaning as for EnvSource. */
  delimiter?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return selectKeys(parse(content), this.opts)
    } catch (err) {
      if (!this.opts.required && err instanceof Error && "code" in err && err.code === "ENOENT") {
        return {}
      }
      throw err
    }
  }
}

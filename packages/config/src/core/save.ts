import fs from "node:fs/promises"
import path from "node:path"

/**
 * Write `value` as pretty-printed JSON, creating parent directories.
 * The file is written beside its final name and renamed into place.
 */
export async function saveJsonConfig(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true })

  const temp = `${file}.${process.pid}.tmp`

  await fs.writeFile(temp, `${JSON.stringify(value, null, 2)}\n`, { mode: 0o644 })
  await fs.rename(temp, file)
}

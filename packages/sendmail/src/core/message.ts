export type ParsedMessage = {
  /** Header values by name as written, decoded as UTF-8. A repeated header keeps its last value. */
  headers: Map<string, string>
  /** Body bytes as read, whatever their charset. */
  body: Buffer
}

export type ParseMessageOptions = {
  /** Treat a line holding a single dot as ordinary text. @default false */
  ignoreDots?: boolean
}

/**
 * Splits sendmail input into headers and body. Headers run until the first empty line;
 * header lines without a colon are skipped. Body lines are joined with `\n` and trailing
 * newlines are dropped.
 *
 * A string input is taken as UTF-8. Lines are split on a latin1 view of the bytes, one
 * character per byte, so the body keeps bytes that are not valid UTF-8.
 */
export function parseMessage(input: Buffer | string, options: ParseMessageOptions = {}): ParsedMessage {
  const bytes = typeof input === "string" ? Buffer.from(input, "utf8") : input
  const headers = new Map<string, string>()
  const body: string[] = []
  let inHeaders = true

  for (const line of bytes.toString("latin1").split(/\r?\n/)) {
    if (inHeaders) {
      if (line === "") {
        inHeaders = false
        continue
      }

      const colon = line.indexOf(":")
      if (colon !== -1) {
        headers.set(utf8(line.slice(0, colon)).trim(), utf8(line.slice(colon + 1)).trim())
      }
      continue
    }

    if (!options.ignoreDots && line === ".") break

    body.push(line)
  }

  return { headers, body: Buffer.from(body.join("\n").replace(/\n+$/, ""), "latin1") }
}

function utf8(latin1: string): string {
  return Buffer.from(latin1, "latin1").toString("utf8")
}

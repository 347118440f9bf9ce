function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain starting at `err`, outermost first.
 *
 * Stops at `maxDepth` entries or when a value repeats.
 */
export function errorChain(err: unknown, maxDepth: number = 20): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current !== undefined && current !== null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)
    current = getCause(current)
  }

  return chain
}

/**
 * One-line description of an error and its causes: `"outer: middle: root"`.
 *
 * Consecutive duplicate messages are collapsed, which happens when a wrapper reuses the
 * message of the error it wraps.
 */
export function describeError(err: unknown): string {
  const parts: string[] = []

  for (const entry of errorChain(err)) {
    const text = messageOf(entry)

    if (text && parts.at(-1) !== text) parts.push(text)
  }

  return parts.length > 0 ? parts.join(": ") : "Unknown error"
}

function messageOf(v: unknown): string {
  if (v instanceof Error) return v.message
  if (typeof v === "string") return v

  return ""
}

export type Tree = Record<string, unknown>

export function isPlainObject(v: unknown): v is Tree {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false

  const proto: unknown = Object.getPrototypeOf(v)

  return proto === Object.prototype || proto === null
}

/**
 * Dotted paths of every leaf in `tree`. Arrays are leaves.
 */
export function leafPaths(tree: Tree, prefix = ""): string[] {
  const paths: string[] = []

  for (const [key, value] of Object.entries(tree)) {
    const path = prefix ? `${prefix}.${key}` : key

    if (isPlainObject(value)) paths.push(...leafPaths(value, path))
    else paths.push(path)
  }

  return paths
}

/**
 * Deep-merge `overlay` into `target` in place, recording the source of each leaf set.
 * `undefined` leaves are skipped.
 */
export function mergeInto(
  target: Tree,
  overlay: Tree,
  sourceName: string,
  provenance: Map<string, string>,
  prefix = "",
): void {
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue

    const path = prefix ? `${prefix}.${key}` : key
    const existing = target[key]

    if (isPlainObject(value)) {
      const branch: Tree = isPlainObject(existing) ? existing : {}
      target[key] = branch
      mergeInto(branch, value, sourceName, provenance, path)
      continue
    }

    target[key] = Array.isArray(value) ? [...value] : value
    provenance.set(path, sourceName)
  }
}

/**
 * Nest flat `A__B__C` keys into `{ a: { b: { c } } }`, turning each SCREAMING_SNAKE segment
 * into camelCase. Keys without the delimiter become top-level camelCase keys.
 */
export function nestKeys(flat: Record<string, string | undefined>, delimiter: string): Tree {
  const root: Tree = {}

  for (const [key, value] of Object.entries(flat)) {
    if (value === undefined) continue

    const segments = key.split(delimiter).map(toCamelCase)
    const leaf = segments.pop()
    if (!leaf || segments.some((s) => s === "")) continue

    let node = root
    for (const segment of segments) {
      const next = node[segment]
      if (isPlainObject(next)) {
        node = next
      } else {
        const branch: Tree = {}
        node[segment] = branch
        node = branch
      }
    }

    node[leaf] = value
  }

  return root
}

function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_+([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase())
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }

  return value
}

import type { MiddlewareHandler } from "hono"

export const CORS_HEADERS = {
  "Access-Control-Allow-Methods": "POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Max-Age": "86400",
} as const

/**
 * CORS for a single form endpoint. The fixed headers go on every response; the origin is
 * echoed only on an exact match. Preflights end here, as does any request from an origin
 * that is not listed.
 */
export function originGuard(allowedOrigins: readonly string[]): MiddlewareHandler {
  const allowed = new Set(allowedOrigins)

  return async (c, next) => {
    const origin = c.req.header("origin") ?? ""
    const originAllowed = allowed.has(origin)

    for (const [name, value] of Object.entries(CORS_HEADERS)) c.header(name, value)
    if (originAllowed) c.header("Access-Control-Allow-Origin", origin)

    if (c.req.method === "OPTIONS") {
      return c.body(null, originAllowed ? 200 : 403)
    }

    if (!originAllowed) {
      c.get("logger").warn("Invalid origin", { origin })
      return c.text("Forbidden", 403)
    }

    await next()
  }
}

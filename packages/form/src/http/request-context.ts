import { randomUUID } from "node:crypto"
import type { Logger } from "@mailrelay/logger"
import type { MiddlewareHandler } from "hono"

/**
 * Gives each request an id and a logger scoped to it, then logs the outcome.
 *
 * Policy:
 * - 5xx => error
 * - else => debug
 */
export function requestContext(baseLogger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const requestId = randomUUID()
    const logger = baseLogger.child({ requestId })

    c.set("requestId", requestId)
    c.set("logger", logger)

    logger.debug("Handling new submission request", { method: c.req.method, path: c.req.path })

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const meta = {
        method: c.req.method,
        path: c.req.path,
        status,
        durationMs: Math.round(performance.now() - start),
      }

      if (status >= 500) {
        logger.error("Request completed", meta)
      } else {
        logger.debug("Request completed", meta)
      }
    }
  }
}

import type { Logger } from "@mailrelay/logger"
import type { RelayRequest } from "@mailrelay/protocol"
import { Hono } from "hono"
import { bodyLimit } from "hono/body-limit"
import { formatSubmission, parseContactForm } from "../core/contact-form"
import { originGuard } from "./origin-guard"
import { requestContext } from "./request-context"

/** Hands one request to the relay; rejects when it could not be written. */
export type FormSender = (address: string, request: RelayRequest) => Promise<void>

export interface FormAppDeps {
  logger: Logger
  send: FormSender
}

export interface FormAppOptions {
  allowedOrigins: readonly string[]

  /** Mailbox that receives every submission, normally `smtp.fromAddr`. */
  recipient: string

  /** Relay listening address, `server.internalAddr`. */
  relayAddr: string

  /** Larger bodies are refused with 413. */
  maxBodyBytes: number
}

/**
 * Contact form endpoint. Any path accepts the POST; the body is validated and forwarded to
 * the relay as one email to `recipient`.
 */
export function createFormApp(deps: FormAppDeps, options: FormAppOptions): Hono {
  const app = new Hono()

  app.use("*", requestContext(deps.logger))
  app.use("*", originGuard(options.allowedOrigins))

  app.post(
    "*",
    bodyLimit({
      maxSize: options.maxBodyBytes,
      onError: (c) => c.text("Request body too large", 413),
    }),
    async (c) => {
      const logger = c.get("logger")
      const parsed = parseContactForm(await c.req.text())

      if (!parsed.ok) {
        if (parsed.reason === "malformed") {
          logger.error("Failed to decode request body", { reason: parsed.message })
          return c.text("Invalid request body", 400)
        }

        logger.error("Form validation failed", { reason: parsed.message })
        return c.text(parsed.message, 400)
      }

      const { form } = parsed

      logger.debug("Received form submission", {
        name: form.name,
        email: form.email,
        messageLength: form.message.length,
      })

      const request = formatSubmission(form, options.recipient)

      try {
        await deps.send(options.relayAddr, request)
      } catch (err) {
        logger.error("Failed to forward submission to relay", { err })
        return c.text("Failed to process submission", 500)
      }

      logger.info("Form submission processed successfully", {
        name: form.name,
        email: form.email,
        subject: request.subject,
      })

      return c.json({ status: "success" })
    },
  )

  app.all("*", (c) => {
    c.get("logger").warn("Invalid request method", { method: c.req.method })
    return c.text("Method not allowed", 405)
  })

  app.onError((err, c) => {
    c.get("logger").error("Request failed", { err })
    return c.text("Internal Server Error", 500)
  })

  return app
}

export type CreateFormAppFn = typeof createFormApp

import type Mail from "nodemailer/lib/mailer"
import type SMTPTransport from "nodemailer/lib/smtp-transport"
import type { MailMessage } from "../../ports/message"
import type { SmtpSettings } from "../../ports/settings"
import type { MailTransport, SendResult } from "../../ports/transport"
import { type CreateSmtpClientFn, createSmtpClient } from "./smtp-client"
import { SmtpTransportError } from "./smtp-transport-error"

export type SmtpTransportDeps = {
  /** @default nodemailer's createTransport */
  createClient?: CreateSmtpClientFn
}

/**
 * One SMTP session per send: plaintext connect, mandatory STARTTLS upgrade (TLS 1.2 or
 * newer, certificate checked against the configured host), AUTH PLAIN, one message, quit.
 */
export class SmtpTransport implements MailTransport {
  private readonly createClient: CreateSmtpClientFn

  constructor(deps: SmtpTransportDeps = {}) {
    this.createClient = deps.createClient ?? createSmtpClient
  }

  async send(message: MailMessage, settings: SmtpSettings): Promise<SendResult> {
    const context = { host: settings.host, port: settings.port }
    const client = this.createClient(this.toClientOptions(settings))

    try {
      const response = await client.sendMail(this.toMailOptions(message))

      if (!response.messageId) {
        throw new SmtpTransportError("SMTP did not return a message ID", context)
      }

      const accepted = this.toStringArray(response.accepted)
      const rejected = this.toStringArray(response.rejected)

      return {
        provider: "smtp",
        messageId: response.messageId,
        ...(accepted && { accepted }),
        ...(rejected && { rejected }),
      }
    } catch (err) {
      if (err instanceof SmtpTransportError) throw err

      throw new SmtpTransportError(
        `failed to send email via ${settings.host}:${settings.port}`,
        context,
        err,
      )
    } finally {
      client.close()
    }
  }

  private toClientOptions(settings: SmtpSettings): SMTPTransport.Options {
    return {
      host: settings.host,
      port: settings.port,
      secure: false,
      requireTLS: true,
      tls: { servername: settings.host, minVersion: "TLSv1.2" },
      authMethod: "PLAIN",
      auth: { user: settings.authUser, pass: settings.authPass },
      connectionTimeout: settings.timeoutMs,
      greetingTimeout: settings.timeoutMs,
      socketTimeout: settings.timeoutMs,
    }
  }

  private toMailOptions(message: MailMessage): Mail.Options {
    return {
      from: message.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
    }
  }

  private toStringArray(addresses: unknown): string[] | undefined {
    if (!Array.isArray(addresses)) return undefined

    return addresses
      .map((a: unknown) => {
        if (typeof a === "string") return a
        if (typeof a === "object" && a && "address" in a && typeof a.address === "string") {
          return a.address
        }

        return null
      })
      .filter((a): a is string => a !== null)
  }
}

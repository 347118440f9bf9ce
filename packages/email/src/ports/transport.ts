import type { MailMessage } from "./message"
import type { SmtpSettings } from "./settings"

export type SendResult = {
  provider: string
  messageId: string

  accepted?: string[]
  rejected?: string[]
}

/**
 * Sends one message per call over a fresh session.
 *
 * Every failure (connect, TLS upgrade, auth, transmission) rejects with a single
 * retryable error; callers do not branch on the cause.
 */
export interface MailTransport {
  send(message: MailMessage, settings: SmtpSettings): Promise<SendResult>
}

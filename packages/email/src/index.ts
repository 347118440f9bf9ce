export {
  type CreateSmtpClientFn,
  createSmtpClient,
  type SmtpClient,
  type SmtpDelivery,
} from "./adapters/smtp/smtp-client"
export { SmtpTransport, type SmtpTransportDeps } from "./adapters/smtp/smtp-transport"
export { SmtpTransportError } from "./adapters/smtp/smtp-transport-error"
export type { MailMessage } from "./ports/message"
export type { SmtpSettings } from "./ports/settings"
export type { MailTransport, SendResult } from "./ports/transport"

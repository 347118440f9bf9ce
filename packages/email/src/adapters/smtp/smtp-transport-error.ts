import { BaseError } from "@mailrelay/errors"

export class SmtpTransportError extends BaseError<"smtp_send_failed"> {
  constructor(message: string, context: { host: string; port: number }, cause?: unknown) {
    super(message, {
      code: "smtp_send_failed",
      context,
      isRetryable: true,
      ...(cause !== undefined && { cause }),
    })
  }
}

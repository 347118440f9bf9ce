import { BaseError } from "@mailrelay/errors"
import { ExitCode } from "./exit-code"

export type SendmailErrorCode =
  | "usage"
  | "no_recipient"
  | "config_unavailable"
  | "input_unreadable"
  | "relay_failed"

const exitCodes: Record<SendmailErrorCode, ExitCode> = {
  usage: ExitCode.USAGE,
  no_recipient: ExitCode.NO_USER,
  config_unavailable: ExitCode.UNAVAILABLE,
  input_unreadable: ExitCode.USAGE,
  relay_failed: ExitCode.TEMP_FAIL,
}

/** A failure that ends the command, carrying the exit status it maps to. */
export class SendmailError extends BaseError<SendmailErrorCode> {
  readonly exitCode: ExitCode

  constructor(code: SendmailErrorCode, message: string, cause?: unknown) {
    super(message, {
      code,
      ...(cause !== undefined && { cause }),
      isRetryable: code === "relay_failed",
    })

    this.exitCode = exitCodes[code]
  }
}

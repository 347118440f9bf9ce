import type { RelayRequest } from "@mailrelay/protocol"
import type { SendmailArgs } from "./args"
import type { ParsedMessage } from "./message"
import { SendmailError } from "./sendmail-error"

export const DEFAULT_SUBJECT = "Message from mailrelay-sendmail"

/**
 * Picks the recipient (`To` header with `-t`, else the first argument) and the subject
 * (`-s`, else the `Subject` header, else a fixed default).
 *
 * @throws SendmailError `no_recipient` when `-t` finds no `To` header, `usage` when no
 * recipient argument was given.
 */
export function buildRequest(args: SendmailArgs, message: ParsedMessage): RelayRequest {
  return {
    recipient: pickRecipient(args, message),
    subject: args.subject || message.headers.get("Subject") || DEFAULT_SUBJECT,
    body: message.body,
  }
}

function pickRecipient(args: SendmailArgs, message: ParsedMessage): string {
  if (args.recipientFromHeaders) {
    const to = message.headers.get("To")
    if (!to) throw new SendmailError("no_recipient", "No recipient specified in headers")

    return to
  }

  const [recipient] = args.recipients
  if (!recipient) throw new SendmailError("usage", "No recipient specified")

  return recipient
}

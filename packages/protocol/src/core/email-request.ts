import { z } from "zod/mini"
import { RequestDecodeError } from "./request-decode-error"

/** One message to relay. `body` holds the raw bytes; on the wire it is standard base64. */
export type EmailRequest = {
  recipient: string
  subject: string
  body: Buffer
}

/** Absent and `null` fields both read as empty. */
const emptyIfMissing = z.transform((value: string | null | undefined) => value ?? "")

export const emailRequestSchema = z.object({
  recipient: z.pipe(z.nullish(z.string()), emptyIfMissing),
  subject: z.pipe(z.nullish(z.string()), emptyIfMissing),
  body: z.pipe(z.nullish(z.base64()), emptyIfMissing),
})

export type EmailRequestWire = z.output<typeof emailRequestSchema>

export function parseEmailRequest(value: unknown): EmailRequest {
  const result = emailRequestSchema.safeParse(value)

  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : ""

    throw new RequestDecodeError(
      "invalid_request",
      `invalid email request: ${where}${issue?.message ?? "unknown issue"}`,
      result.error,
    )
  }

  const { recipient, subject, body } = result.data

  return { recipient, subject, body: Buffer.from(body, "base64") }
}

export type EncodeRequestOptions = {
  /**
   * Append a newline after the object.
   * @default true
   */
  newline?: boolean
}

export function encodeEmailRequest(
  request: Pick<EmailRequest, "recipient" | "subject"> & { body: Buffer | string },
  options: EncodeRequestOptions = {},
): Buffer {
  const wire: EmailRequestWire = {
    recipient: request.recipient,
    subject: request.subject,
    body: Buffer.from(request.body).toString("base64"),
  }
  const newline = options.newline ?? true

  return Buffer.from(`${JSON.stringify(wire)}${newline ? "\n" : ""}`, "utf8")
}

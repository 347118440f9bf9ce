export type MailMessage = {
  from: string
  to: string
  subject: string

  /** Plain-text body. Bytes are passed through as received. */
  text: string | Buffer
}

import { createTransport } from "nodemailer"
import type Mail from "nodemailer/lib/mailer"
import type SMTPTransport from "nodemailer/lib/smtp-transport"

export type SmtpDelivery = {
  messageId: string
  accepted?: unknown
  rejected?: unknown
}

/** The part of a nodemailer transporter the SMTP transport drives. */
export interface SmtpClient {
  sendMail(mail: Mail.Options): Promise<SmtpDelivery>
  close(): void
}

export type CreateSmtpClientFn = (options: SMTPTransport.Options) => SmtpClient

export const createSmtpClient: CreateSmtpClientFn = (options) => createTransport(options)

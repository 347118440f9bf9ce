import type { RelayRequest } from "@mailrelay/protocol"
import { z } from "zod/mini"

export type ContactForm = {
  name: string
  /** The visitor's address. It goes into the body, never into the envelope. */
  email: string
  message: string
}

/** Shape of the posted JSON. Missing fields read as empty strings. */
export const contactFormBodySchema = z.object({
  name: z._default(z.string(), ""),
  email: z._default(z.string(), ""),
  message: z._default(z.string(), ""),
})

const notBlank = (value: string): boolean => value.trim() !== ""

export const contactFormSchema = z.object({
  name: z.string().check(z.refine(notBlank, { error: "name is required" })),
  email: z.string().check(z.refine((value) => value.includes("@"), { error: "invalid email address" })),
  message: z.string().check(z.refine(notBlank, { error: "message is required" })),
})

export type ContactFormResult =
  | { ok: true; form: ContactForm }
  | { ok: false; reason: "malformed" | "invalid"; message: string }

/**
 * Decodes a posted body. `malformed` covers anything that is not a JSON object with string
 * fields; `invalid` carries the first failed rule.
 */
export function parseContactForm(text: string): ContactFormResult {
  let value: unknown

  try {
    value = JSON.parse(text)
  } catch {
    return { ok: false, reason: "malformed", message: "request body is not valid JSON" }
  }

  const body = contactFormBodySchema.safeParse(value)
  if (!body.success) {
    return { ok: false, reason: "malformed", message: firstIssue(body.error) }
  }

  const form = contactFormSchema.safeParse(body.data)
  if (!form.success) {
    return { ok: false, reason: "invalid", message: firstIssue(form.error) }
  }

  return { ok: true, form: form.data }
}

function firstIssue(error: { issues: ReadonlyArray<{ message: string }> }): string {
  return error.issues[0]?.message ?? "invalid form"
}

export function formatSubmission(form: ContactForm, recipient: string): RelayRequest {
  return {
    recipient,
    subject: `Contact Form Submission from ${form.name}`,
    body:
      "New contact form submission:\n\n" +
      `Name: ${form.name}\n` +
      `Email: ${form.email}\n\n` +
      `Message:\n${form.message}`,
  }
}

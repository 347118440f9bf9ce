/** Upstream SMTP account. Taken from the configuration snapshot of the request being sent. */
export type SmtpSettings = {
  host: string
  port: number
  authUser: string
  authPass: string

  /**
   * Connect, greeting and socket inactivity deadline for one session.
   * An attempt in flight is bounded only by this, not by request cancellation.
   */
  timeoutMs: number
}

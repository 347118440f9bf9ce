/**
 * Owner of the stream log entries are written to.
 *
 * @remarks
 * Loggers created on top of a sink share it; closing the sink ends output for all of
 * them, so a sink is closed only once nothing logs through it anymore.
 */
export interface LogSink {
  /** Resolves once buffered entries have been handed to the operating system. */
  flush(): Promise<void>

  /** Flushes and releases the underlying stream. Idempotent. */
  close(): Promise<void>
}

import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance: which levels are emitted and how they are rendered.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Render entries for humans instead of as JSON lines.
   *
   * @remarks
   * Meant for local runs; keep it off where logs are ingested by tooling.
   */
  prettify?: boolean
}

export type LogTarget = "file" | "stdout" | "stderr"

/**
 * Where a sink writes.
 */
export type LogSinkOptions = {
  target: LogTarget

  /** Directory for the log files. Required when `target` is "file"; created if missing. */
  directory?: string

  /** Base name of the log files, which are written as `<name>.<n>.log`. */
  name: string

  /**
   * Bytes buffered before a write is issued to the file.
   * Ignored for stdout and stderr, which are written synchronously.
   *
   * @default 0
   */
  bufferSize?: number

  /**
   * Size in KiB at which the file rolls over to `<name>.<n+1>.log`.
   * Checked after each write, so a file can end slightly larger.
   */
  maxFileSizeKb?: number

  /**
   * Files kept on disk, the one being written included. Older files are removed on roll.
   * Needs `maxFileSizeKb`.
   */
  maxFiles?: number
}

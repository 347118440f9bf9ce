import {
  createPinoLogger,
  type Logger,
  type LogContextPatch,
  type LogSink,
  openLogSink,
} from "@mailrelay/logger"
import type { LoggingConfig } from "../config/relay-config"

export type OpenedLogging = {
  logger: Logger
  sink: LogSink
}

/** Opens the sink described by `settings` and a pino logger writing to it. */
export async function openLogging(
  settings: LoggingConfig,
  context: LogContextPatch = {},
): Promise<OpenedLogging> {
  const sink = await openLogSink({
    target: settings.target,
    directory: settings.directory,
    name: settings.name,
    bufferSize: settings.bufferSize,
    maxFileSizeKb: settings.maxSizeMb * 1024,
    maxFiles: settings.maxFiles,
  })

  const logger = createPinoLogger(
    { destination: sink.stream },
    { level: settings.level, prettify: settings.prettify },
    context,
  )

  return { logger, sink }
}

export type OpenLoggingFn = typeof openLogging

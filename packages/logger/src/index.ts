export { createNullLogger, NullLogger, NullLogSink } from "./adapters/null/null-logger"
export {
  openLogSink,
  PinoLogSink,
  type PinoLogSinkOptions,
} from "./adapters/pino/pino-log-sink"
export { createPinoLogger, PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { LogSink } from "./ports/log-sink"
export type { Logger } from "./ports/logger"
export type { LoggerOptions, LogSinkOptions, LogTarget } from "./ports/logger-options"

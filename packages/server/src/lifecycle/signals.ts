import type { Logger } from "@mailrelay/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** Runs on SIGHUP. Expected to log its own failures and never reject. */
  reload?: () => Promise<void>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
}

export interface SignalHandler {
  unregister: () => void
}

type FatalReason = "uncaughtException" | "unhandledRejection"

/**
 * Process-level reactions for one running service. Once a stop has begun, further stop
 * signals are only logged and SIGHUP is ignored.
 */
class ProcessSignals {
  private stopping = false
  private readonly fatalTimeoutMs: number

  constructor(private readonly ctx: SignalHandlerContext) {
    this.fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  }

  readonly onHangup = (): void => {
    this.ctx.logger.info("Received signal", { signal: "SIGHUP" })

    if (this.stopping || !this.ctx.reload) return

    this.ctx.reload().catch((err: unknown) => this.ctx.logger.error("Reload failed", { err }))
  }

  readonly onInterrupt = (): void => this.onStopSignal("SIGINT")

  readonly onTerminate = (): void => this.onStopSignal("SIGTERM")

  readonly onUncaught = (err: Error): void => this.onFatal("uncaughtException", err)

  readonly onRejection = (reason: unknown): void => this.onFatal("unhandledRejection", reason)

  private onStopSignal(signal: NodeJS.Signals): void {
    this.ctx.logger.info("Received signal", { signal })

    if (!this.begin()) return

    this.ctx.logger.warn("Shutdown triggered", { reason: signal })

    void this.stopThenExit(signal, 0)
  }

  private onFatal(reason: FatalReason, err: unknown): void {
    if (!this.begin()) {
      this.ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      this.exit(1)
      return
    }

    this.ctx.logger.fatal("Fatal error", { reason, err })

    const timer = setTimeout(() => {
      this.ctx.logger.fatal("Forced exit after timeout", { timeoutMs: this.fatalTimeoutMs })
      this.exit(1)
    }, this.fatalTimeoutMs)
    timer.unref()

    void this.stopThenExit(reason, 1).finally(() => clearTimeout(timer))
  }

  /** Marks the stop as started; false when one already was. */
  private begin(): boolean {
    if (this.stopping) return false

    this.stopping = true
    return true
  }

  private async stopThenExit(reason: string, code: number): Promise<void> {
    const { logger, stop } = this.ctx

    if (!stop) {
      logger.warn("No stop handler registered", { reason })
    } else {
      try {
        const result = await stop()

        if (!result.ok) {
          logger.error("Shutdown completed with issues", {
            reason,
            failureCount: result.failures.length,
            timedOut: result.timedOut,
          })
        }
      } catch (err) {
        logger.error("Shutdown failed", { reason, err })
      }
    }

    this.exit(code)
  }

  private exit(code: number): void {
    if (this.ctx.exit) this.ctx.exit(code)
    else process.exit(code)
  }
}

/**
 * Registers process handlers: SIGHUP reloads, SIGINT and SIGTERM stop gracefully and exit 0,
 * uncaught errors stop and exit 1.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const signals = new ProcessSignals(ctx)

  process.on("SIGHUP", signals.onHangup)
  process.on("SIGINT", signals.onInterrupt)
  process.on("SIGTERM", signals.onTerminate)
  process.on("uncaughtException", signals.onUncaught)
  process.on("unhandledRejection", signals.onRejection)

  return {
    unregister: () => {
      process.off("SIGHUP", signals.onHangup)
      process.off("SIGINT", signals.onInterrupt)
      process.off("SIGTERM", signals.onTerminate)
      process.off("uncaughtException", signals.onUncaught)
      process.off("unhandledRejection", signals.onRejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

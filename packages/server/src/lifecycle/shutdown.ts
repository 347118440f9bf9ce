import type { Clock, Milliseconds } from "@mailrelay/clock"
import type { Logger } from "@mailrelay/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks, untilAborted } from "./run-hooks"

export const DEFAULT_FLUSH_TIMEOUT_MS = 5_000

export type ShutdownContext = {
  clock: Clock
  logger: Logger

  /** Budget shared by `stopHooks`: stop accepting, then drain connections. */
  drainTimeoutMs: Milliseconds
  stopHooks: LifecycleHook[]

  /** Flushes buffered log entries. Runs after the stop hooks, on its own deadline. */
  flush: () => Promise<void>

  /** @default DEFAULT_FLUSH_TIMEOUT_MS */
  flushTimeoutMs?: Milliseconds
}

/**
 * Result of graceful shutdown attempt.
 */
export type StopResult = {
  /** True if shutdown completed cleanly (no failures, no timeout). */
  ok: boolean

  /** Hooks that threw during shutdown. */
  failures: HookFailure[]

  /**
   * True if a deadline was reached before completion. Connections still open at that
   * point were left running.
   */
  timedOut: boolean
}

export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  const { clock, logger } = ctx

  logger.warn("Shutting down gracefully", { drainTimeoutMs: ctx.drainTimeoutMs })

  const drained = await runHooks(
    { phase: "shutdown", clock, logger, deadlineMs: clock.nowMs() + ctx.drainTimeoutMs },
    ctx.stopHooks,
  )

  logger.info("Shutdown complete", {
    ok: drained.failures.length === 0 && !drained.timedOut,
    failures: drained.failures.length,
    timedOut: drained.timedOut,
  })

  const flushed = await runHooks(
    {
      phase: "flush",
      clock,
      logger,
      deadlineMs: clock.nowMs() + (ctx.flushTimeoutMs ?? DEFAULT_FLUSH_TIMEOUT_MS),
    },
    [createFlushHook(ctx.flush)],
  )

  const failures = [...drained.failures, ...flushed.failures]
  const timedOut = drained.timedOut || flushed.timedOut

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

function createFlushHook(flush: () => Promise<void>): LifecycleHook {
  return {
    name: "logger.flush",
    fn: async ({ signal }) => {
      await untilAborted(flush(), signal)
    },
  }
}
export type ShutdownFn = typeof shutdown

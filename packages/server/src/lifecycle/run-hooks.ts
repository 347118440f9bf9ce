import type { Clock, UnixMs } from "@mailrelay/clock"
import type { Logger } from "@mailrelay/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "shutdown" | "flush"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksResult = {
  failures: HookFailure[]
  timedOut: boolean
}

/**
 * Runs hooks in order against one shared deadline. A failing hook does not stop the
 * ones after it; reaching the deadline does.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const outcome = await runOneHook(ctx, hook)

    if (outcome.failure) failures.push(outcome.failure)
    if (outcome.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

type HookOutcome = { failure?: HookFailure; timedOut: boolean }

async function runOneHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookOutcome> {
  const { phase, logger } = ctx
  const msLeft = timeLeftMs(ctx)

  if (msLeft <= 0) {
    logger.warn("Skipping remaining hooks, deadline reached", { phase, hook: hook.name })
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), msLeft)
  timer.unref()

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: msLeft })

    if (didHitDeadline(ctx, controller)) {
      logger.warn("Deadline exceeded during hook", { phase, hook: hook.name })
      return { timedOut: true }
    }

    logger.debug("Executed hook", { phase, hook: hook.name })

    return { timedOut: false }
  } catch (err) {
    logger.error("Hook failed", { phase, hook: hook.name, err })

    return {
      failure: { hook: hook.name, error: err },
      timedOut: didHitDeadline(ctx, controller),
    }
  } finally {
    clearTimeout(timer)
  }
}

function didHitDeadline(ctx: RunHooksContext, controller: AbortController): boolean {
  return controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs
}

function timeLeftMs(ctx: RunHooksContext): number {
  return Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
}

const ABORTED = Symbol("aborted")

/**
 * Waits for `work` unless `signal` aborts first. Resolves `true` when the work finished,
 * `false` when it was abandoned; a rejection of `work` is passed on.
 */
export async function untilAborted(work: Promise<unknown>, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false

  let onAbort: (() => void) | undefined

  const aborted = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED)
    signal.addEventListener("abort", onAbort, { once: true })
  })

  try {
    return (await Promise.race([work, aborted])) !== ABORTED
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort)
  }
}

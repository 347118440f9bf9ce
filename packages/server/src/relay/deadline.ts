export type Deadline = {
  /** Aborts when the parent aborts or `ms` elapse, whichever comes first. */
  signal: AbortSignal
  /** Clears the timer and detaches from the parent. */
  dispose: () => void
}

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`)
    this.name = "DeadlineExceededError"
  }
}

export function withDeadline(parent: AbortSignal, ms: number): Deadline {
  const controller = new AbortController()

  if (parent.aborted) {
    controller.abort(parent.reason)
    return { signal: controller.signal, dispose: () => {} }
  }

  const onParentAbort = (): void => controller.abort(parent.reason)
  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(ms)), ms)
  timer.unref()

  parent.addEventListener("abort", onParentAbort, { once: true })

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer)
      parent.removeEventListener("abort", onParentAbort)
    },
  }
}

import type { Logger } from "@mailrelay/logger"

/**
 * Holds the handler promise of every open connection so shutdown can wait for them.
 */
export class ConnectionTracker {
  private readonly inFlight = new Set<Promise<void>>()

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.inFlight.size
  }

  track(work: Promise<void>): void {
    const settled = work
      .catch((err: unknown) => this.logger.error("Connection handler failed", { err }))
      .finally(() => this.inFlight.delete(settled))

    this.inFlight.add(settled)
  }

  /**
   * Resolves `true` once every tracked connection has settled, or `false` when `signal`
   * aborts first. Connections tracked while draining are waited for too.
   */
  async drain(signal: AbortSignal): Promise<boolean> {
    const aborted = abortedPromise(signal)

    while (this.inFlight.size > 0) {
      if (signal.aborted) return false

      const settled = await Promise.race([
        Promise.allSettled([...this.inFlight]).then(() => true),
        aborted,
      ])

      if (!settled) return false
    }

    return true
  }
}

function abortedPromise(signal: AbortSignal): Promise<false> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false)
      return
    }

    signal.addEventListener("abort", () => resolve(false), { once: true })
  })
}

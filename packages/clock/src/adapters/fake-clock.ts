import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export type FakeSleep = {
  ms: Milliseconds
  startedAt: UnixMs
  aborted: boolean
}

/**
 * Virtual-time clock for tests.
 *
 * `sleep()` never waits on a timer: it advances the virtual time by `ms` and resolves,
 * unless the signal is already aborted, in which case time stays put.
 */
export class FakeClock implements Clock {
  readonly sleeps: FakeSleep[] = []

  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    const aborted = signal?.aborted ?? false

    this.sleeps.push({ ms, startedAt: this.time, aborted })

    if (aborted || ms <= 0) return

    this.advance(ms)
  }
}

import type { Milliseconds } from "@mailrelay/clock"

export type Delay = { milliseconds: Milliseconds }

/** Decides how long to wait after the given 0-indexed attempt failed. */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}

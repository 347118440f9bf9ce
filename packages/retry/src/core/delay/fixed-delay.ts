import type { Milliseconds } from "@mailrelay/clock"
import type { DelayPolicy } from "../../ports/delay-policy"

/** Same wait after every failed attempt. */
export function fixedDelay(ms: Milliseconds): DelayPolicy {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`delay must be a finite number >= 0 (got ${ms})`)
  }

  const delay = Object.freeze({ milliseconds: ms })

  return { getDelay: () => delay }
}

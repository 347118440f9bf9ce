import type { Milliseconds } from "@mailrelay/clock"

export type SuccessfulRetryResult<T> = {
  success: true
  value: T
  attempts: number
  elapsedMs: Milliseconds
}

export type FailedRetryResult = {
  success: false
  /** Last attempt's error, or the abort reason when no attempt ran. */
  error: unknown
  attempts: number
  elapsedMs: Milliseconds
  aborted: boolean
}

export type RetryResult<T> = SuccessfulRetryResult<T> | FailedRetryResult

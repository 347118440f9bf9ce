import type { DelayPolicy } from "./delay-policy"
import type { RetryObserver } from "./observer"

/**
 * Configuration for retry behavior.
 *
 * @remarks
 * `maxAttempts` is total tries, not retries.
 * - maxAttempts=1 → try once, no retry
 * - maxAttempts=3 → try once + up to 2 retries
 *
 * Every failure is retried until attempts run out.
 */
export interface RetryConfig<T = unknown> {
  /** Total attempts (not retries). Must be >= 1 */
  maxAttempts: number

  /** Delay policy between attempts */
  delay: DelayPolicy

  /** Lifecycle hooks */
  observer?: RetryObserver<T>

  /**
   * Signal for cooperative cancellation. Only the wait between attempts is cut short;
   * an attempt already running is left to finish.
   */
  signal?: AbortSignal
}

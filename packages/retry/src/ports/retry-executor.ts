import type { RetryFn } from "./attempt-context"
import type { RetryConfig } from "./retry-config"
import type { RetryResult } from "./retry-result"

/**
 * Executes functions with retry logic.
 *
 * @remarks
 * AbortSignal behavior:
 * - Already aborted at start → no attempt is made, result is aborted
 * - Aborted while sleeping → the sleep ends early, no further attempt, result is aborted
 * - Aborted during fn → fn's responsibility; the executor stops before the next attempt
 *
 * tryExecute() never rejects for failed attempts or aborts; it rejects only for
 * invalid config or a throwing observer.
 */
export interface IRetryExecutor {
  tryExecute<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<RetryResult<T>>
}

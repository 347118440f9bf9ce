import type { AttemptContext, RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks for observability.
 *
 * @remarks
 * Observer methods should not throw. If they do, the executor treats it as
 * programmer error and propagates.
 */
export interface RetryObserver<T> {
  onAttempt?(ctx: AttemptContext): Promise<void>
  onError?(error: unknown, info: RetryAttemptInfo): Promise<void>
  onSuccess?(result: T, ctx: AttemptContext): Promise<void>
  onExhausted?(error: unknown, info: RetryAttemptInfo): Promise<void>
  onAborted?(ctx: AttemptContext): Promise<void>
}

export { fixedDelay } from "./core/delay/fixed-delay"
export { createRetryExecutor, RetryExecutor, type RetryExecutorDeps } from "./core/retry-executor"
export type { AttemptContext, RetryAttemptInfo, RetryFn } from "./ports/attempt-context"
export type { Delay, DelayPolicy } from "./ports/delay-policy"
export type { RetryObserver } from "./ports/observer"
export type { RetryConfig } from "./ports/retry-config"
export type { IRetryExecutor } from "./ports/retry-executor"
export type { FailedRetryResult, RetryResult, SuccessfulRetryResult } from "./ports/retry-result"

import type { Clock, UnixMs } from "@mailrelay/clock"
import type { AttemptContext, RetryAttemptInfo, RetryFn } from "../ports/attempt-context"
import type { RetryConfig } from "../ports/retry-config"
import type { IRetryExecutor } from "../ports/retry-executor"
import type { RetryResult } from "../ports/retry-result"

export type RetryExecutorDeps = {
  clock: Clock
}

export function createRetryExecutor(deps: RetryExecutorDeps): IRetryExecutor {
  return new RetryExecutor(deps)
}

type Outcome<T> = { done: true; result: RetryResult<T> } | { done: false }
type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: unknown }

export class RetryExecutor implements IRetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async tryExecute<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<RetryResult<T>> {
    this.validateConfig(config)

    const { maxAttempts, observer, signal } = config
    const startedAt = this.deps.clock.nowMs()

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const ctx = this.buildContext(attempt, startedAt, signal)

      if (signal?.aborted) {
        await observer?.onAborted?.(ctx)
        return this.abortedResult(signal.reason, attempt, ctx.elapsedMs)
      }

      await observer?.onAttempt?.(ctx)

      const attemptResult = await this.tryAttempt(fn, ctx)

      if (attemptResult.ok) {
        await observer?.onSuccess?.(attemptResult.value, ctx)
        return this.successResult(attemptResult.value, attempt + 1, startedAt)
      }

      const outcome = await this.handleError(
        attemptResult.error,
        ctx,
        attempt === maxAttempts - 1,
        config,
      )

      if (outcome.done) return outcome.result
    }

    throw new Error("Unreachable: retry loop must terminate via return")
  }

  private async tryAttempt<T>(fn: RetryFn<T>, ctx: AttemptContext): Promise<AttemptResult<T>> {
    try {
      const value = await fn(ctx)
      return { ok: true, value }
    } catch (error) {
      return { ok: false, error }
    }
  }

  private async handleError<T>(
    error: unknown,
    ctx: AttemptContext,
    isLastAttempt: boolean,
    config: RetryConfig<T>,
  ): Promise<Outcome<T>> {
    const { delay: delayPolicy, observer, signal } = config

    if (isLastAttempt) {
      await observer?.onExhausted?.(error, this.buildAttemptInfo(ctx, null, true))

      return {
        done: true,
        result: this.exhaustedResult(error, ctx.attempt + 1, ctx.startedAt),
      }
    }

    const nextDelayMs = delayPolicy.getDelay(ctx.attempt).milliseconds

    await observer?.onError?.(error, this.buildAttemptInfo(ctx, nextDelayMs, false))

    if (nextDelayMs > 0) await this.deps.clock.sleep(nextDelayMs, signal)

    if (signal?.aborted) {
      const abortCtx = this.buildContext(ctx.attempt + 1, ctx.startedAt, signal)
      await observer?.onAborted?.(abortCtx)

      return {
        done: true,
        result: this.abortedResult(error, ctx.attempt + 1, abortCtx.elapsedMs),
      }
    }

    return { done: false }
  }

  private validateConfig(config: RetryConfig<unknown>): void {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`)
    }
  }

  private buildContext(attempt: number, startedAt: UnixMs, signal?: AbortSignal): AttemptContext {
    return {
      attempt,
      attemptsSoFar: attempt + 1,
      startedAt,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
      ...(signal && { signal }),
    }
  }

  private buildAttemptInfo(
    ctx: AttemptContext,
    nextDelayMs: number | null,
    isLastAttempt: boolean,
  ): RetryAttemptInfo {
    return { ...ctx, nextDelayMs, isLastAttempt }
  }

  private successResult<T>(value: T, attempts: number, startedAt: UnixMs): RetryResult<T> {
    return {
      success: true,
      value,
      attempts,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
    }
  }

  private abortedResult(error: unknown, attempts: number, elapsedMs: number): RetryResult<never> {
    return { success: false, error, attempts, elapsedMs, aborted: true }
  }

  private exhaustedResult(error: unknown, attempts: number, startedAt: UnixMs): RetryResult<never> {
    return {
      success: false,
      error,
      attempts,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
      aborted: false,
    }
  }
}

/**
 * Resilience wrappers.
 *
 * Each wrapper takes an async operation and returns a function with the same
 * signature, so they nest freely: `withTiming(withRetry(fetch), ...)`.
 */

import { runWithCallContext } from './call-context.js'
import { errorMessage, isRetryable } from './errors.js'
import { logger as defaultLogger, type Logger } from './logger.js'

type AsyncOperation<A extends unknown[], T> = (...args: A) => Promise<T>

/**
 * Retry options for async operations
 */
export interface RetryOptions {
  maxAttempts: number
  delayMs: number
  /** 1 keeps the delay fixed between attempts */
  backoffMultiplier: number
  maxDelayMs: number
  /** Per-call timeout advisory published to every attempt */
  timeoutMs?: number
  shouldRetry: (error: unknown) => boolean
  name: string
  logger: Logger
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMultiplier: 1,
  maxDelayMs: 30000,
  shouldRetry: isRetryable,
  name: 'operation',
  logger: defaultLogger,
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Re-invoke `operation` on failure, up to `maxAttempts` calls in total, and
 * rethrow the last error once attempts run out. Errors rejected by
 * `shouldRetry` are rethrown immediately.
 */
export function withRetry<A extends unknown[], T>(
  operation: AsyncOperation<A, T>,
  options: Partial<RetryOptions> = {}
): AsyncOperation<A, T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options }
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts))

  return async (...args: A): Promise<T> => {
    let delay = opts.delayMs

    for (let attempt = 1; ; attempt++) {
      try {
        return await runWithCallContext(
          { attempt, maxAttempts, timeoutMs: opts.timeoutMs },
          () => operation(...args)
        )
      } catch (error) {
        if (attempt >= maxAttempts || !opts.shouldRetry(error)) {
          if (attempt > 1) {
            opts.logger.error(
              `[${opts.name}] Failed after ${attempt} attempts: ${errorMessage(error)}`
            )
          }
          throw error
        }

        opts.logger.warn(
          `[${opts.name}] Attempt ${attempt}/${maxAttempts} failed, retrying in ${delay}ms: ${errorMessage(error)}`
        )
        if (delay > 0) {
          await sleep(delay)
        }
        delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs)
      }
    }
  }
}

export interface SafeDefaultOptions {
  name?: string
  logger?: Logger
  onError?: (error: unknown) => void
}

/**
 * Swallow-and-report: on failure log the error, notify `onError` and resolve
 * to `defaultValue`.
 */
export function withSafeDefault<A extends unknown[], T, D = T>(
  operation: AsyncOperation<A, T>,
  defaultValue: D,
  options: SafeDefaultOptions = {}
): AsyncOperation<A, T | D> {
  const log = options.logger ?? defaultLogger
  const name = options.name ?? 'operation'

  return async (...args: A): Promise<T | D> => {
    try {
      return await operation(...args)
    } catch (error) {
      log.error(`[SafeDefault] ${name} failed: ${errorMessage(error)}`)
      options.onError?.(error)
      return defaultValue
    }
  }
}

export interface TimingRecord {
  name: string
  durationMs: number
  ok: boolean
}

export interface TimingOptions {
  name?: string
  logger?: Logger
  onDuration?: (record: TimingRecord) => void
}

/**
 * Measure wall-clock duration of every call, successful or not. The result
 * (or error) passes through untouched.
 */
export function withTiming<A extends unknown[], T>(
  operation: AsyncOperation<A, T>,
  options: TimingOptions = {}
): AsyncOperation<A, T> {
  const log = options.logger ?? defaultLogger
  const name = options.name ?? 'operation'

  return async (...args: A): Promise<T> => {
    const start = performance.now()
    let ok = false
    try {
      const result = await operation(...args)
      ok = true
      return result
    } finally {
      const durationMs = performance.now() - start
      log.debug(`[Timer] ${name} took ${durationMs.toFixed(1)}ms${ok ? '' : ' (failed)'}`)
      options.onDuration?.({ name, durationMs, ok })
    }
  }
}

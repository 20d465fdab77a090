import type { ILogger } from '@shopsweep/logger'
import { classifyDbError, PersistenceError } from './errors.js'

export interface ContentionRetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
}

export const DEFAULT_CONTENTION_RETRY: ContentionRetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
}

export interface ContentionRetryOptions {
  operation: string
  policy?: ContentionRetryPolicy
  logger?: ILogger
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms))

export function backoffDelay(policy: ContentionRetryPolicy, attempt: number): number {
  return Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelayMs
  )
}

/**
 * Run `fn`, retrying with exponential backoff when it fails on pool exhaustion,
 * deadlock or serialization conflicts. Any other failure, or the last contention
 * failure, is rethrown wrapped in PersistenceError.
 */
export async function withContentionRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: ContentionRetryOptions
): Promise<T> {
  const policy = options.policy ?? DEFAULT_CONTENTION_RETRY
  const sleep = options.sleep ?? defaultSleep

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      const classified = classifyDbError(error)

      if (classified.kind !== 'contention' || attempt >= policy.maxAttempts) {
        throw new PersistenceError(options.operation, attempt, classified.kind, error)
      }

      const delayMs = backoffDelay(policy, attempt)
      options.logger?.warn('Database contention, retrying', {
        operation: options.operation,
        attempt,
        maxAttempts: policy.maxAttempts,
        reason: classified.reason,
        delayMs,
      })
      await sleep(delayMs)
    }
  }
}

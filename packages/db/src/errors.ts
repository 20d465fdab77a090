/**
 * Database error classification.
 *
 * Only contention is retried: everything else (constraint violations, syntax,
 * missing tables) fails the first time.
 */

/** SQLSTATE codes that indicate contention rather than a bad statement */
export const CONTENTION_SQLSTATES: Record<string, string> = {
  '40P01': 'deadlock_detected',
  '40001': 'serialization_failure',
  '53300': 'too_many_connections',
}

/** pg-pool rejects acquisitions with this message once connectionTimeoutMillis elapses */
const POOL_EXHAUSTED_MESSAGES = [
  'timeout exceeded when trying to connect',
  'sorry, too many clients already',
]

export type DbErrorKind = 'contention' | 'other'

export interface ClassifiedDbError {
  kind: DbErrorKind
  code?: string
  reason: string
}

export class PersistenceError extends Error {
  readonly code = 'PERSISTENCE_FAILED'
  readonly attempts: number
  readonly kind: DbErrorKind

  constructor(operation: string, attempts: number, kind: DbErrorKind, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`${operation} failed after ${attempts} attempt(s): ${detail}`, { cause })
    this.name = 'PersistenceError'
    this.attempts = attempts
    this.kind = kind
  }
}

function sqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error
    return typeof code === 'string' ? code : undefined
  }
  return undefined
}

export function classifyDbError(error: unknown): ClassifiedDbError {
  const code = sqlState(error)
  if (code && CONTENTION_SQLSTATES[code]) {
    return { kind: 'contention', code, reason: CONTENTION_SQLSTATES[code] }
  }

  const message = error instanceof Error ? error.message.toLowerCase() : ''
  if (POOL_EXHAUSTED_MESSAGES.some(fragment => message.includes(fragment))) {
    return { kind: 'contention', code, reason: 'pool_exhausted' }
  }

  return { kind: 'other', code, reason: code ?? 'unclassified' }
}

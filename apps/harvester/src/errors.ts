/**
 * Harvester error types.
 *
 * Expected upstream conditions (timeouts, expired tokens, malformed cards) are
 * modeled as result values, not exceptions. These classes cover the failures
 * that do unwind: bad configuration and missing records.
 */

export const HARVESTER_ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  STORE_NOT_FOUND: 'STORE_NOT_FOUND',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const

export type HarvesterErrorCode = (typeof HARVESTER_ERROR_CODES)[keyof typeof HARVESTER_ERROR_CODES]

export class HarvesterError extends Error {
  readonly code: HarvesterErrorCode

  constructor(code: HarvesterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HarvesterError'
    this.code = code
  }
}

export class ConfigError extends HarvesterError {
  constructor(message: string) {
    super(HARVESTER_ERROR_CODES.CONFIGURATION_ERROR, message)
    this.name = 'ConfigError'
  }
}

export class StoreNotFoundError extends HarvesterError {
  readonly storeId: number

  constructor(storeId: number) {
    super(HARVESTER_ERROR_CODES.STORE_NOT_FOUND, `Store ${storeId} not found`)
    this.name = 'StoreNotFoundError'
    this.storeId = storeId
  }
}

/**
 * Message text for logging an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

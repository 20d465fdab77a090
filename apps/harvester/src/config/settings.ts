/**
 * Harvester settings, read once from the environment.
 *
 * Invalid numeric values fall back to the default with a warning rather than
 * failing startup.
 */

import type { ILogger } from '@shopsweep/logger'
import { loggers } from './logger.js'

export interface HarvesterSettings {
  /** Per-request timeout for storefront calls */
  requestTimeoutMs: number
  /** Pause after every storefront request */
  requestDelayMs: number
  /** Stores processed concurrently by one sync run */
  maxWorkers: number
  userAgent: string
  refreshCategoriesOnSync: boolean
  deactivateMissingProducts: boolean
  productOrderBy: string
  syncCron: string
  bootstrapConcurrency: number
  dbContentionMaxAttempts: number
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'

export const DEFAULT_SETTINGS: HarvesterSettings = {
  requestTimeoutMs: 30000,
  requestDelayMs: 500,
  maxWorkers: 10,
  userAgent: DEFAULT_USER_AGENT,
  refreshCategoriesOnSync: false,
  deactivateMissingProducts: false,
  productOrderBy: 'new',
  syncCron: '0 */6 * * *',
  bootstrapConcurrency: 2,
  dbContentionMaxAttempts: 3,
}

type Env = Record<string, string | undefined>

function readInt(env: Env, key: string, fallback: number, min: number, log: ILogger): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback

  const parsed = Number(raw)
  if (!Number.isInteger(parsed) || parsed < min) {
    log.warn('Invalid numeric setting, using default', { key, value: raw, default: fallback })
    return fallback
  }
  return parsed
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase()
  if (!raw) return fallback
  return raw === 'true' || raw === '1' || raw === 'yes'
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim()
  return raw ? raw : fallback
}

export function loadSettings(env: Env = process.env, log: ILogger = loggers.sync): HarvesterSettings {
  return {
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_SETTINGS.requestTimeoutMs, 1, log),
    requestDelayMs: readInt(env, 'REQUEST_DELAY_MS', DEFAULT_SETTINGS.requestDelayMs, 0, log),
    maxWorkers: readInt(env, 'MAX_WORKERS', DEFAULT_SETTINGS.maxWorkers, 1, log),
    userAgent: readString(env, 'USER_AGENT', DEFAULT_SETTINGS.userAgent),
    refreshCategoriesOnSync: readBool(env, 'REFRESH_CATEGORIES_ON_SYNC', DEFAULT_SETTINGS.refreshCategoriesOnSync),
    deactivateMissingProducts: readBool(env, 'DEACTIVATE_MISSING_PRODUCTS', DEFAULT_SETTINGS.deactivateMissingProducts),
    productOrderBy: readString(env, 'PRODUCT_ORDER_BY', DEFAULT_SETTINGS.productOrderBy),
    syncCron: readString(env, 'SYNC_CRON', DEFAULT_SETTINGS.syncCron),
    bootstrapConcurrency: readInt(env, 'BOOTSTRAP_CONCURRENCY', DEFAULT_SETTINGS.bootstrapConcurrency, 1, log),
    dbContentionMaxAttempts: readInt(
      env,
      'DB_CONTENTION_MAX_ATTEMPTS',
      DEFAULT_SETTINGS.dbContentionMaxAttempts,
      1,
      log
    ),
  }
}

let cached: HarvesterSettings | null = null

/**
 * Process-wide settings. Tests should call loadSettings() with an explicit env instead.
 */
export function getSettings(): HarvesterSettings {
  if (!cached) {
    cached = loadSettings()
  }
  return cached
}

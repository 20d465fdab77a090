/**
 * Scraper Core Types
 *
 * Fetch contracts, extractor results and run outcomes shared by the
 * token, category and product extractors, the store worker and the
 * orchestrator.
 */

import type { CategoryDraft, Category, ProductRecord, Store } from '@shopsweep/db'

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

export type HttpMethod = 'GET' | 'POST'

export interface FetchOptions {
  method?: HttpMethod

  /** Form fields, sent as application/x-www-form-urlencoded (POST only) */
  form?: Record<string, string>

  /** Request timeout in ms (default: fetcher's timeout) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

export type FetchResultStatus =
  | 'ok'
  | 'forbidden' // 403: storefront rejected the session token
  | 'error'
  | 'timeout'
  | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  body?: string
  error?: string
  durationMs: number
}

export interface Fetcher {
  request(url: string, options?: FetchOptions): Promise<FetchResult>
}

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

/**
 * Fixed pause applied after storefront requests.
 */
export interface Politeness {
  pause(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extractors
// ═══════════════════════════════════════════════════════════════════════════════

export interface TokenSource {
  acquire(store: Store): Promise<string | null>
}

export interface CategoryExtractor {
  extract(store: Store): Promise<CategoryDraft[]>
}

/**
 * Outcome of paging through one category.
 *
 * `credential_expired` carries no products: a 403 mid-category discards the
 * partial pages so the caller's retry is the only source of rows.
 */
export type ProductExtractResult =
  | {
      status: 'ok'
      products: ProductRecord[]
      pagesFetched: number
      /** True when paging ended on an empty page rather than a failed request */
      exhausted: boolean
      error?: string
    }
  | { status: 'credential_expired'; pagesFetched: number }

export interface ProductSource {
  extract(store: Store, category: Category, credential: string, orderBy?: string): Promise<ProductExtractResult>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

export type StoreFailureReason =
  | 'no_categories'
  | 'credential_unavailable'
  | 'credential_expired'
  | 'persistence_failed'
  | 'unexpected_error' // the worker threw; contained by the orchestrator

export interface StoreOutcome {
  storeId: number
  storeName: string
  /** Distinct products written across all categories */
  productCount: number
  success: boolean
  reason?: StoreFailureReason
  categoriesTotal: number
  categoriesSucceeded: number
  categoriesFailed: number
  credentialRefreshes: number
  /** Products marked inactive by the reconciliation pass */
  productsDeactivated: number
  durationMs: number
}

export interface SyncSummary {
  runId: string
  totalStores: number
  succeeded: number
  failed: number
  /** Stores never started because the run was aborted */
  skipped: number
  totalProducts: number
  durationMs: number
  outcomes: StoreOutcome[]
}

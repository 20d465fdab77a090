/**
 * Storefront scraper
 *
 * Token renewal, category discovery, paginated product extraction and the
 * sync orchestrator.
 */

// Core types
export * from './types.js'

// Fetch layer
export { HttpFetcher } from './fetch/http-fetcher.js'
export type { HttpFetcherOptions } from './fetch/http-fetcher.js'
export { PolitenessDelay } from './fetch/politeness.js'

// Extractors
export { TokenAcquirer, extractWebToken, WEB_TOKEN_PATTERN } from './tokens/token-acquirer.js'
export {
  createCategoryExtractor,
  ListingPageCategoryExtractor,
  WooCommerceCategoryExtractor,
  parseCategoryListing,
  mapStoreApiCategories,
} from './categories/index.js'
export { ProductExtractor, productPageForm } from './products/product-extractor.js'
export { parseProductCards, stockStatusFromButton } from './products/parse.js'

// Orchestration
export { StoreWorker } from './store-worker.js'
export type { StoreWorkerDeps, StoreRunContext } from './store-worker.js'
export { runProductSync, summarize } from './orchestrator.js'
export type { ProductSyncOptions, StoreRunner } from './orchestrator.js'
export { bootstrapStore, extractCategories, refreshTokens } from './bootstrap.js'
export { createRuntime } from './runtime.js'
export type { HarvesterRuntime } from './runtime.js'
export { assertValidCron, isSyncDue, SyncScheduler } from './scheduler.js'
export type { SyncSchedulerConfig } from './scheduler.js'

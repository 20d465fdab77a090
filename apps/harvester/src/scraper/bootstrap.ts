/**
 * Store bootstrap: token acquisition and category discovery.
 *
 * Runs once when a store is created (queue job) and on demand from the CLI.
 * Product syncs only read the categories written here unless
 * REFRESH_CATEGORIES_ON_SYNC is set.
 */

import type { CatalogRepository, Store } from '@shopsweep/db'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { CategoryExtractor, TokenSource } from './types.js'
import { StoreNotFoundError } from '../errors.js'

export interface BootstrapDeps {
  repository: CatalogRepository
  tokens: TokenSource
  categoryExtractorFor: (store: Store) => CategoryExtractor
  logger?: ILogger
  now?: () => Date
}

export interface TokenRefreshSummary {
  attempted: number
  acquired: number
  failed: number
}

export interface CategoryBootstrapResult {
  storeId: number
  extracted: number
  inserted: number
}

export interface StoreBootstrapResult extends CategoryBootstrapResult {
  /** null when the store already had a token */
  tokenAcquired: boolean | null
}

/**
 * Acquire and store a token for each store, one store at a time.
 */
export async function refreshTokens(stores: Store[], deps: BootstrapDeps): Promise<TokenRefreshSummary> {
  const log = deps.logger ?? silentLogger
  const now = deps.now ?? (() => new Date())
  const summary: TokenRefreshSummary = { attempted: 0, acquired: 0, failed: 0 }

  for (const store of stores) {
    summary.attempted++
    const token = await deps.tokens.acquire(store)
    if (token) {
      await deps.repository.updateStoreCredential(store.id, token, now())
      summary.acquired++
    } else {
      summary.failed++
    }
  }

  log.info('Token refresh complete', { ...summary })
  return summary
}

export async function extractCategories(store: Store, deps: BootstrapDeps): Promise<CategoryBootstrapResult> {
  const log = (deps.logger ?? silentLogger).child({ storeId: store.id, storeName: store.name })

  const drafts = await deps.categoryExtractorFor(store).extract(store)
  const inserted = await deps.repository.insertCategories(drafts)

  log.info('Categories stored', { extracted: drafts.length, inserted })
  return { storeId: store.id, extracted: drafts.length, inserted }
}

/**
 * Bring a newly created store to a syncable state: a token (when it has
 * none) and its category set.
 */
export async function bootstrapStore(storeId: number, deps: BootstrapDeps): Promise<StoreBootstrapResult> {
  const store = await deps.repository.getStore(storeId)
  if (!store) {
    throw new StoreNotFoundError(storeId)
  }

  let tokenAcquired: boolean | null = null
  if (!store.credential) {
    const { acquired } = await refreshTokens([store], deps)
    tokenAcquired = acquired > 0
  }

  const categories = await extractCategories(store, deps)
  return { ...categories, tokenAcquired }
}

/**
 * Product Sync Orchestrator
 *
 * Fans store workers out over a bounded pool and folds their outcomes into a
 * run summary. A worker that throws is counted as a failed store; it never
 * stops its siblings. Aborting the signal stops new stores from starting.
 */

import { createId } from '@paralleldrive/cuid2'
import type { CatalogRepository, Store } from '@shopsweep/db'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { StoreRunContext } from './store-worker.js'
import type { StoreOutcome, SyncSummary } from './types.js'
import { mapLimit } from './utils/pool.js'
import { errorMessage } from '../errors.js'

export interface StoreRunner {
  run(store: Store, ctx?: StoreRunContext): Promise<StoreOutcome>
}

export interface ProductSyncOptions {
  repository: CatalogRepository
  worker: StoreRunner
  maxWorkers: number
  /** Restrict the run to these stores instead of every configured store */
  stores?: Store[]
  signal?: AbortSignal
  runId?: string
  logger?: ILogger
}

function thrownOutcome(store: Store, startTime: number): StoreOutcome {
  return {
    storeId: store.id,
    storeName: store.name,
    productCount: 0,
    success: false,
    reason: 'unexpected_error',
    categoriesTotal: 0,
    categoriesSucceeded: 0,
    categoriesFailed: 0,
    credentialRefreshes: 0,
    productsDeactivated: 0,
    durationMs: Date.now() - startTime,
  }
}

export function summarize(
  runId: string,
  totalStores: number,
  outcomes: StoreOutcome[],
  durationMs: number
): SyncSummary {
  const succeeded = outcomes.filter(outcome => outcome.success).length
  const failed = outcomes.length - succeeded
  return {
    runId,
    totalStores,
    succeeded,
    failed,
    skipped: totalStores - outcomes.length,
    totalProducts: outcomes.reduce((sum, outcome) => sum + outcome.productCount, 0),
    durationMs,
    outcomes,
  }
}

/**
 * Sync products for every store (or `options.stores`) and return the summary.
 */
export async function runProductSync(options: ProductSyncOptions): Promise<SyncSummary> {
  const startTime = Date.now()
  const runId = options.runId ?? createId()
  const log = (options.logger ?? silentLogger).child({ runId })

  const stores = options.stores ?? (await options.repository.listStores())

  if (stores.length === 0) {
    log.info('No stores configured, nothing to sync')
    return summarize(runId, 0, [], Date.now() - startTime)
  }

  log.info('Product sync started', { stores: stores.length, maxWorkers: options.maxWorkers })

  const outcomes: StoreOutcome[] = []

  await mapLimit(
    stores,
    options.maxWorkers,
    async store => {
      const storeStart = Date.now()
      let outcome: StoreOutcome
      try {
        outcome = await options.worker.run(store, { runId })
      } catch (error) {
        log.error('Store worker threw', { storeId: store.id, storeName: store.name, error: errorMessage(error) }, error)
        outcome = thrownOutcome(store, storeStart)
      }

      outcomes.push(outcome)
      if (outcome.success) {
        log.info('Store succeeded', { storeId: store.id, storeName: store.name, products: outcome.productCount })
      } else {
        log.warn('Store failed', {
          storeId: store.id,
          storeName: store.name,
          reason: outcome.reason,
          products: outcome.productCount,
        })
      }
    },
    options.signal
  )

  const summary = summarize(runId, stores.length, outcomes, Date.now() - startTime)

  if (summary.skipped > 0) {
    log.warn('Sync aborted before all stores started', { skipped: summary.skipped })
  }

  log.info('Product sync complete', {
    totalStores: summary.totalStores,
    succeeded: summary.succeeded,
    failed: summary.failed,
    skipped: summary.skipped,
    totalProducts: summary.totalProducts,
    durationMs: summary.durationMs,
  })

  return summary
}

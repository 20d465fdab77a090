/**
 * Store Worker
 *
 * Drives one store end-to-end:
 * 1. Optionally re-extract categories, then load them
 * 2. Acquire a token when the store has none
 * 3. Extract each category in order, persisting its products immediately
 * 4. On token expiry: renew once and retry the same category once
 *
 * Category failures are contained; the store is abandoned only when no token
 * can be obtained, the renewed token is rejected too, or the database gives up.
 * Products written before an abandon stay written.
 */

import { PersistenceError, type CatalogRepository, type Category, type Store } from '@shopsweep/db'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { HarvesterSettings } from '../config/settings.js'
import type {
  CategoryExtractor,
  ProductExtractResult,
  ProductSource,
  StoreFailureReason,
  StoreOutcome,
  TokenSource,
} from './types.js'
import { errorMessage } from '../errors.js'

export type StoreWorkerSettings = Pick<
  HarvesterSettings,
  'refreshCategoriesOnSync' | 'deactivateMissingProducts' | 'productOrderBy'
>

export interface StoreWorkerDeps {
  repository: CatalogRepository
  tokens: TokenSource
  products: ProductSource
  categoryExtractorFor: (store: Store) => CategoryExtractor
  settings: StoreWorkerSettings
  logger?: ILogger
  now?: () => Date
}

export interface StoreRunContext {
  runId?: string
}

/** Raised inside run() to stop processing the store with a reason */
class StoreAbandoned extends Error {
  constructor(readonly reason: StoreFailureReason) {
    super(reason)
    this.name = 'StoreAbandoned'
  }
}

interface Tally {
  productCount: number
  categoriesTotal: number
  categoriesSucceeded: number
  categoriesFailed: number
  credentialRefreshes: number
  productsDeactivated: number
}

export class StoreWorker {
  private readonly repository: CatalogRepository
  private readonly tokens: TokenSource
  private readonly products: ProductSource
  private readonly categoryExtractorFor: (store: Store) => CategoryExtractor
  private readonly settings: StoreWorkerSettings
  private readonly log: ILogger
  private readonly now: () => Date

  constructor(deps: StoreWorkerDeps) {
    this.repository = deps.repository
    this.tokens = deps.tokens
    this.products = deps.products
    this.categoryExtractorFor = deps.categoryExtractorFor
    this.settings = deps.settings
    this.log = deps.logger ?? silentLogger
    this.now = deps.now ?? (() => new Date())
  }

  async run(store: Store, ctx: StoreRunContext = {}): Promise<StoreOutcome> {
    const startTime = Date.now()
    const log = this.log.child({ runId: ctx.runId, storeId: store.id, storeName: store.name })
    const tally: Tally = {
      productCount: 0,
      categoriesTotal: 0,
      categoriesSucceeded: 0,
      categoriesFailed: 0,
      credentialRefreshes: 0,
      productsDeactivated: 0,
    }

    const finish = (reason?: StoreFailureReason): StoreOutcome => ({
      storeId: store.id,
      storeName: store.name,
      success: reason === undefined,
      ...(reason ? { reason } : {}),
      ...tally,
      durationMs: Date.now() - startTime,
    })

    try {
      const categories = await this.loadCategories(store, log)
      tally.categoriesTotal = categories.length
      if (categories.length === 0) {
        log.warn('No categories for store')
        return finish('no_categories')
      }

      let credential = store.credential
      if (!credential) {
        log.info('Store has no token, acquiring')
        credential = await this.renewCredential(store)
        if (!credential) throw new StoreAbandoned('credential_unavailable')
      }

      log.info('Processing categories', { count: categories.length })

      for (const category of categories) {
        credential = await this.processCategory(store, category, credential, tally, log)
      }

      log.info('Store complete', {
        products: tally.productCount,
        categoriesSucceeded: tally.categoriesSucceeded,
        categoriesFailed: tally.categoriesFailed,
      })
      return finish()
    } catch (error) {
      if (error instanceof StoreAbandoned) {
        log.error('Store abandoned', { reason: error.reason, products: tally.productCount })
        return finish(error.reason)
      }
      if (error instanceof PersistenceError) {
        log.error('Store abandoned', { reason: 'persistence_failed', products: tally.productCount }, error)
        return finish('persistence_failed')
      }
      throw error
    }
  }

  private async loadCategories(store: Store, log: ILogger): Promise<Category[]> {
    if (this.settings.refreshCategoriesOnSync) {
      const drafts = await this.categoryExtractorFor(store).extract(store)
      const inserted = await this.repository.insertCategories(drafts)
      log.info('Refreshed categories', { extracted: drafts.length, inserted })
    }
    return this.repository.listCategories(store.id)
  }

  /**
   * Acquire a token and store it. Returns null when the homepage yields none.
   */
  private async renewCredential(store: Store): Promise<string | null> {
    const token = await this.tokens.acquire(store)
    if (token) {
      await this.repository.updateStoreCredential(store.id, token, this.now())
    }
    return token
  }

  /**
   * Extract and persist one category. Returns the credential to use for the
   * next category (renewed if this one hit an expiry).
   */
  private async processCategory(
    store: Store,
    category: Category,
    credential: string,
    tally: Tally,
    storeLog: ILogger
  ): Promise<string> {
    const log = storeLog.child({ categoryId: category.id, categorySlug: category.slug })
    const syncedAt = this.now()

    let result = await this.extractSafely(store, category, credential, log)
    if (result === null) {
      tally.categoriesFailed++
      return credential
    }

    if (result.status === 'credential_expired') {
      log.warn('Token expired, renewing')
      tally.credentialRefreshes++
      const renewed = await this.renewCredential(store)
      if (!renewed) throw new StoreAbandoned('credential_unavailable')
      credential = renewed

      result = await this.extractSafely(store, category, credential, log)
      if (result === null) {
        tally.categoriesFailed++
        return credential
      }
      if (result.status === 'credential_expired') {
        throw new StoreAbandoned('credential_expired')
      }
    }

    const written = await this.repository.upsertProducts(result.products, syncedAt)
    tally.productCount += written

    if (result.error) {
      tally.categoriesFailed++
      log.warn('Category ended early', { written, pages: result.pagesFetched, error: result.error })
    } else {
      tally.categoriesSucceeded++
      log.info('Category saved', { written, pages: result.pagesFetched })
    }

    if (this.settings.deactivateMissingProducts && result.exhausted) {
      const deactivated = await this.repository.deactivateMissingProducts(store.id, category.id, syncedAt)
      tally.productsDeactivated += deactivated
      if (deactivated > 0) {
        log.info('Deactivated missing products', { deactivated })
      }
    }

    return credential
  }

  /**
   * Run the extractor; an unexpected throw is logged and reported as null.
   */
  private async extractSafely(
    store: Store,
    category: Category,
    credential: string,
    log: ILogger
  ): Promise<ProductExtractResult | null> {
    try {
      return await this.products.extract(store, category, credential, this.settings.productOrderBy)
    } catch (error) {
      log.error('Category extraction failed', { error: errorMessage(error) })
      return null
    }
  }
}

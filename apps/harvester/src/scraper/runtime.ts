/**
 * Wires the scraper components for one process from settings.
 *
 * The repository is constructed by the caller (it owns the pool lifecycle);
 * everything here is stateless apart from the shared fetcher.
 */

import type { CatalogRepository, Store } from '@shopsweep/db'
import type { HarvesterSettings } from '../config/settings.js'
import { loggers } from '../config/logger.js'
import { createCategoryExtractor } from './categories/index.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { PolitenessDelay } from './fetch/politeness.js'
import { ProductExtractor } from './products/product-extractor.js'
import { StoreWorker } from './store-worker.js'
import { TokenAcquirer } from './tokens/token-acquirer.js'
import type { StoreRunner } from './orchestrator.js'
import type { CategoryExtractor, Fetcher, Politeness, ProductSource, TokenSource } from './types.js'

export interface HarvesterRuntime {
  fetcher: Fetcher
  politeness: Politeness
  tokens: TokenSource
  products: ProductSource
  categoryExtractorFor: (store: Store) => CategoryExtractor
  storeWorker: StoreRunner
}

export function createRuntime(repository: CatalogRepository, settings: HarvesterSettings): HarvesterRuntime {
  const fetcher = new HttpFetcher({
    timeoutMs: settings.requestTimeoutMs,
    userAgent: settings.userAgent,
  })
  const politeness = new PolitenessDelay(settings.requestDelayMs)

  const tokens = new TokenAcquirer({ fetcher, politeness, logger: loggers.tokens })
  const products = new ProductExtractor({ fetcher, politeness, logger: loggers.products })
  const categoryExtractorFor = (store: Store): CategoryExtractor =>
    createCategoryExtractor(store, { fetcher, politeness, logger: loggers.categories })

  const storeWorker = new StoreWorker({
    repository,
    tokens,
    products,
    categoryExtractorFor,
    settings,
    logger: loggers.sync,
  })

  return { fetcher, politeness, tokens, products, categoryExtractorFor, storeWorker }
}

import type { Store } from '@shopsweep/db'
import type { ILogger } from '@shopsweep/logger'
import type { CategoryExtractor, Fetcher, Politeness } from '../types.js'
import { ListingPageCategoryExtractor } from './listing-page.js'
import { WooCommerceCategoryExtractor } from './woocommerce.js'

export interface CategoryExtractorDeps {
  fetcher: Fetcher
  politeness: Politeness
  logger?: ILogger
}

/**
 * Pick the extractor for the store's catalog source.
 */
export function createCategoryExtractor(store: Store, deps: CategoryExtractorDeps): CategoryExtractor {
  switch (store.catalogSource) {
    case 'woocommerce':
      return new WooCommerceCategoryExtractor(deps.fetcher, deps.politeness, deps.logger)
    case 'listing_page':
      return new ListingPageCategoryExtractor(deps.fetcher, deps.politeness, deps.logger)
  }
}

export { ListingPageCategoryExtractor, parseCategoryListing } from './listing-page.js'
export { WooCommerceCategoryExtractor, mapStoreApiCategories, categoriesUrl } from './woocommerce.js'

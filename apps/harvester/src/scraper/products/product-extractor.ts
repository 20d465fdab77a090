/**
 * Paginated product extraction for one (store, category).
 *
 * Pages are requested by offset, 12 cards at a time, until an empty page.
 * A 403 ends the category immediately with `credential_expired`; any other
 * failed request ends it early and keeps what was collected.
 */

import type { Category, ProductRecord, Store } from '@shopsweep/db'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { Fetcher, Politeness, ProductExtractResult, ProductSource } from '../types.js'
import { joinUrl } from '../utils/url.js'
import { parseProductCards } from './parse.js'
import { PAGE_SIZE } from './selectors.js'
import { errorMessage } from '../../errors.js'

export interface ProductExtractorDeps {
  fetcher: Fetcher
  politeness: Politeness
  logger?: ILogger
}

/**
 * Form body for one page request.
 */
export function productPageForm(
  offset: number,
  credential: string,
  category: Pick<Category, 'slug'>,
  orderBy: string
): Record<string, string> {
  return {
    getresult: String(offset),
    web_token: credential,
    category_slug: category.slug,
    orderby: orderBy,
  }
}

export class ProductExtractor implements ProductSource {
  private readonly fetcher: Fetcher
  private readonly politeness: Politeness
  private readonly log: ILogger

  constructor(deps: ProductExtractorDeps) {
    this.fetcher = deps.fetcher
    this.politeness = deps.politeness
    this.log = deps.logger ?? silentLogger
  }

  async extract(
    store: Store,
    category: Category,
    credential: string,
    orderBy = 'new'
  ): Promise<ProductExtractResult> {
    const log = this.log.child({ storeId: store.id, categoryId: category.id, categorySlug: category.slug })

    if (!store.apiEndpoint) {
      log.warn('Store has no products endpoint')
      return { status: 'ok', products: [], pagesFetched: 0, exhausted: false, error: 'missing api_endpoint' }
    }

    const url = joinUrl(store.baseUrl, store.apiEndpoint)
    const products: ProductRecord[] = []
    let offset = 0
    let pagesFetched = 0

    while (true) {
      if (pagesFetched > 0) {
        await this.politeness.pause()
      }

      log.debug('Fetching product page', { page: pagesFetched + 1, offset })

      let body: string
      try {
        const result = await this.fetcher.request(url, {
          method: 'POST',
          form: productPageForm(offset, credential, category, orderBy),
        })
        pagesFetched++

        if (result.status === 'forbidden') {
          log.warn('Token rejected by products endpoint', { page: pagesFetched, offset })
          return { status: 'credential_expired', pagesFetched }
        }

        if (result.status !== 'ok' || result.body === undefined) {
          const error = result.error ?? result.status
          log.warn('Product page fetch failed', { page: pagesFetched, offset, status: result.status, error })
          return { status: 'ok', products, pagesFetched, exhausted: false, error }
        }
        body = result.body
      } catch (error) {
        const message = errorMessage(error)
        log.error('Product page request threw', { offset, error: message })
        return { status: 'ok', products, pagesFetched, exhausted: false, error: message }
      }

      const page = parseProductCards(body, { storeId: store.id, baseUrl: store.baseUrl, category })
      if (page.length === 0) {
        log.info('Category exhausted', { pages: pagesFetched, products: products.length })
        return { status: 'ok', products, pagesFetched, exhausted: true }
      }

      products.push(...page)
      log.debug('Parsed product page', { page: pagesFetched, count: page.length })
      offset += PAGE_SIZE
    }
  }
}

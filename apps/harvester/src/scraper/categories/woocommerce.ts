/**
 * Category extraction from the WooCommerce Store API.
 *
 * GET <base><endpoint>/products/categories?page=N&per_page=100, paging until
 * a short or empty page.
 */

import { decodeHTML } from 'entities'
import type { CategoryDraft, Store } from '@shopsweep/db'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { CategoryExtractor, Fetcher, Politeness } from '../types.js'
import { joinUrl } from '../utils/url.js'
import { WOOCOMMERCE_DEFAULT_ENDPOINT, WOOCOMMERCE_PAGE_SIZE } from './selectors.js'
import { errorMessage } from '../../errors.js'

/** The fields of a Store API category we read */
interface StoreApiCategory {
  id: number | string
  name: string
  slug: string
  permalink?: string
}

function isStoreApiCategory(value: unknown): value is StoreApiCategory {
  if (typeof value !== 'object' || value === null) return false
  if (!('id' in value) || !('name' in value) || !('slug' in value)) return false
  const { id, name, slug } = value
  return (
    (typeof id === 'number' || (typeof id === 'string' && id !== '')) &&
    typeof name === 'string' &&
    name !== '' &&
    typeof slug === 'string' &&
    slug !== ''
  )
}

export function categoriesUrl(store: Store, page: number): string {
  const endpoint = store.apiEndpoint || WOOCOMMERCE_DEFAULT_ENDPOINT
  const query = new URLSearchParams({ page: String(page), per_page: String(WOOCOMMERCE_PAGE_SIZE) })
  return `${joinUrl(store.baseUrl, endpoint)}/products/categories?${query.toString()}`
}

/**
 * Map one page of Store API entries to drafts, applying the store's name filter.
 * Malformed entries are skipped.
 */
export function mapStoreApiCategories(entries: unknown[], store: Store): CategoryDraft[] {
  const filter = store.categoryFilter ? new Set(store.categoryFilter) : null
  const drafts: CategoryDraft[] = []

  for (const entry of entries) {
    if (!isStoreApiCategory(entry)) continue

    const name = decodeHTML(entry.name)
    if (filter && !filter.has(name)) continue

    drafts.push({
      storeId: store.id,
      externalId: String(entry.id),
      name,
      slug: entry.slug,
      url: typeof entry.permalink === 'string' && entry.permalink ? entry.permalink : null,
    })
  }

  return drafts
}

export class WooCommerceCategoryExtractor implements CategoryExtractor {
  constructor(
    private readonly fetcher: Fetcher,
    private readonly politeness: Politeness,
    private readonly log: ILogger = silentLogger
  ) {}

  async extract(store: Store): Promise<CategoryDraft[]> {
    const log = this.log.child({ storeId: store.id, storeName: store.name })
    const drafts: CategoryDraft[] = []

    for (let page = 1; ; page++) {
      const url = categoriesUrl(store, page)

      let entries: unknown
      try {
        const result = await this.fetcher.request(url, { headers: { Accept: 'application/json' } })
        if (result.status !== 'ok' || result.body === undefined) {
          log.warn('Category page fetch failed', {
            page,
            status: result.status,
            statusCode: result.statusCode,
            error: result.error,
          })
          break
        }
        entries = JSON.parse(result.body)
      } catch (error) {
        log.error('Category page could not be read', { page, error: errorMessage(error) })
        break
      }

      if (!Array.isArray(entries)) {
        log.warn('Category page is not an array', { page })
        break
      }
      if (entries.length === 0) break

      drafts.push(...mapStoreApiCategories(entries, store))

      if (entries.length < WOOCOMMERCE_PAGE_SIZE) break

      await this.politeness.pause()
    }

    log.info('Extracted categories', {
      count: drafts.length,
      source: 'woocommerce',
      filtered: store.categoryFilter !== null,
    })
    return drafts
  }
}

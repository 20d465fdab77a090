/**
 * Category extraction from the HTML category listing.
 */

import * as cheerio from 'cheerio'
import type { CategoryDraft, Store } from '@shopsweep/db'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { CategoryExtractor, Fetcher, Politeness } from '../types.js'
import { absoluteUrl, joinUrl, slugFromHref } from '../utils/url.js'
import { LISTING_PATH, SELECTORS } from './selectors.js'
import { errorMessage } from '../../errors.js'

/**
 * Parse category anchors. Anchors without a name, an href, or an href that
 * ends in `<slug>.html` are skipped. Links are stored absolute.
 */
export function parseCategoryListing(html: string, store: Pick<Store, 'id' | 'baseUrl'>): CategoryDraft[] {
  const $ = cheerio.load(html)
  const drafts: CategoryDraft[] = []

  $(SELECTORS.anchor).each((_, element) => {
    const anchor = $(element)
    const href = (anchor.attr('href') ?? '').trim()
    const name = anchor.find(SELECTORS.name).first().text().trim()
    const slug = href ? slugFromHref(href) : null

    if (!name || !href || !slug) return

    drafts.push({ storeId: store.id, externalId: slug, name, slug, url: absoluteUrl(href, store.baseUrl) })
  })

  return drafts
}

export class ListingPageCategoryExtractor implements CategoryExtractor {
  constructor(
    private readonly fetcher: Fetcher,
    private readonly politeness: Politeness,
    private readonly log: ILogger = silentLogger
  ) {}

  async extract(store: Store): Promise<CategoryDraft[]> {
    const log = this.log.child({ storeId: store.id, storeName: store.name })
    const url = joinUrl(store.baseUrl, LISTING_PATH)

    try {
      const result = await this.fetcher.request(url)
      if (result.status !== 'ok' || result.body === undefined) {
        log.warn('Category listing fetch failed', {
          url,
          status: result.status,
          statusCode: result.statusCode,
          error: result.error,
        })
        return []
      }

      const drafts = parseCategoryListing(result.body, store)
      log.info('Extracted categories', { count: drafts.length, source: 'listing_page' })
      return drafts
    } catch (error) {
      log.error('Category listing extraction failed', { url, error: errorMessage(error) })
      return []
    } finally {
      await this.politeness.pause()
    }
  }
}

/**
 * Product card parsing.
 */

import * as cheerio from 'cheerio'
import type { Category, ProductRecord, StockStatus } from '@shopsweep/db'
import { parsePrice } from '../utils/price.js'
import { absoluteUrl } from '../utils/url.js'
import { PRODUCT_ID_ATTR, SELECTORS, SOLD_OUT_TEXT, STRIKETHROUGH_CLASS } from './selectors.js'

export function stockStatusFromButton(text: string): StockStatus {
  return text.trim().toLowerCase() === SOLD_OUT_TEXT ? 'out_of_stock' : 'in_stock'
}

export interface ParseContext {
  storeId: number
  baseUrl: string
  category: Pick<Category, 'id'>
}

/**
 * Parse one page of product cards. Cards missing a link, a name or a
 * product id are dropped.
 */
export function parseProductCards(html: string, ctx: ParseContext): ProductRecord[] {
  const $ = cheerio.load(html)
  const products: ProductRecord[] = []

  $(SELECTORS.card).each((_, element) => {
    const card = $(element)

    const href = (card.find(SELECTORS.link).first().attr('href') ?? '').trim()
    const headings = card.find(SELECTORS.heading)
    const name = headings.first().text().trim()
    const button = card.find(SELECTORS.button).first()
    const productId = (button.attr(PRODUCT_ID_ATTR) ?? '').trim()

    if (!href || !name || !productId) return

    // Prices sit in the headings after the name
    let currentPrice: number | null = null
    let originalPrice: number | null = null
    for (const heading of headings.slice(1).toArray()) {
      const node = $(heading)
      const price = parsePrice(node.text())
      if (price === null) continue

      if (node.hasClass(STRIKETHROUGH_CLASS)) {
        originalPrice = price
      } else if (currentPrice === null) {
        currentPrice = price
      }
    }

    products.push({
      storeId: ctx.storeId,
      categoryId: ctx.category.id,
      productId,
      name,
      url: absoluteUrl(href, ctx.baseUrl),
      imageUrl: (card.find(SELECTORS.image).first().attr('src') ?? '').trim(),
      currentPrice,
      originalPrice,
      size: card.find(SELECTORS.size).first().text().trim(),
      stockStatus: stockStatusFromButton(button.text()),
    })
  })

  return products
}

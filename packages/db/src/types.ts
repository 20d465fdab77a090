/**
 * Catalog record types shared by the repository and the harvester.
 */

/** Which category source a storefront exposes. */
export type CatalogSource = 'listing_page' | 'woocommerce'

export type StockStatus = 'in_stock' | 'out_of_stock'

export interface Store {
  id: number
  name: string
  slug: string
  baseUrl: string
  /** Products endpoint (listing-page stores) or Store API root (woocommerce stores) */
  apiEndpoint: string | null
  catalogSource: CatalogSource
  /** Session token scraped from the homepage; null until first acquired */
  credential: string | null
  credentialFetchedAt: Date | null
  /** When set, only categories with these display names are kept */
  categoryFilter: string[] | null
}

export interface Category {
  id: number
  storeId: number
  /** Site-specific id (woocommerce) or the slug (listing pages) */
  externalId: string | null
  name: string
  slug: string
  url: string | null
}

export type CategoryDraft = Omit<Category, 'id'>

/**
 * One product card as extracted from a storefront page.
 * Natural key: (storeId, productId).
 */
export interface ProductRecord {
  storeId: number
  categoryId: number
  productId: string
  name: string
  url: string
  imageUrl: string
  currentPrice: number | null
  /** Strikethrough price; null when the item is not discounted */
  originalPrice: number | null
  size: string
  stockStatus: StockStatus
}

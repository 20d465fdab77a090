/**
 * Listing-page storefront category selectors.
 *
 * /allcategory.html renders one anchor per category inside div.cat-area,
 * with the display name in an h4.cat-text.
 */

export const LISTING_PATH = '/allcategory.html'

export const SELECTORS = {
  anchor: 'div.cat-area a',
  name: 'h4.cat-text',
} as const

export const WOOCOMMERCE_DEFAULT_ENDPOINT = '/wp-json/wc/store'
export const WOOCOMMERCE_PAGE_SIZE = 100

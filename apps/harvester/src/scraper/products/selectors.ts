/**
 * Product card selectors for listing-page storefront fragments.
 *
 * The products endpoint returns bare card markup, 12 cards per page.
 */

export const SELECTORS = {
  card: 'div.col-lg-4.col-md-6.col-6',
  link: 'a[href*=".html"]',
  heading: 'h6',
  button: 'button[data-product_id]',
  image: 'img.img-fluid',
  size: 'label.badge.badge-primary',
} as const

/** Heading class marking the struck-through original price */
export const STRIKETHROUGH_CLASS = 'l-through'

export const PRODUCT_ID_ATTR = 'data-product_id'

export const SOLD_OUT_TEXT = 'sold out'

export const PAGE_SIZE = 12

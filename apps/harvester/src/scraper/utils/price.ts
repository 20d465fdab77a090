const PRICE_PATTERN = /\d[\d,]*(?:\.\d+)?/

/**
 * Parse the first number in a localized price label.
 *
 * parsePrice('Rs. 1,250') -> 1250
 * parsePrice('Sold out') -> null
 */
export function parsePrice(text: string): number | null {
  const match = text.match(PRICE_PATTERN)
  if (!match) return null
  const value = Number(match[0].replace(/,/g, ''))
  return Number.isFinite(value) ? value : null
}

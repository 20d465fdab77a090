/**
 * Storefront URL helpers.
 */

/**
 * Join a store base URL and a path, collapsing the slash between them.
 *
 * joinUrl('https://shop.test/', '/allcategory.html') -> 'https://shop.test/allcategory.html'
 */
export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.replace(/\/+$/, '')
  if (!path) return base
  return path.startsWith('/') ? `${base}${path}` : `${base}/${path}`
}

/**
 * Absolute hrefs are returned untouched; relative ones resolve against the store.
 */
export function absoluteUrl(href: string, baseUrl: string): string {
  if (/^https?:\/\//i.test(href)) return href
  try {
    return new URL(href, `${baseUrl.replace(/\/+$/, '')}/`).toString()
  } catch {
    return href
  }
}

/**
 * Last path segment of a category link with the .html suffix removed.
 * Returns null when the link does not end in `<segment>.html`.
 */
export function slugFromHref(href: string): string | null {
  const path = href.split(/[?#]/)[0]
  const match = path.match(/\/([^/]+)\.html$/)
  return match ? match[1] : null
}

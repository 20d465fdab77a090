/**
 * Session token acquisition for listing-page storefronts.
 *
 * The homepage assigns the token in inline script:
 *   var web_token = "3f9a0c...";
 * The product endpoint rejects requests with a 403 once it expires, so
 * re-running this is the only renewal path.
 */

import type { Store } from '@shopsweep/db'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { Fetcher, Politeness, TokenSource } from '../types.js'
import { errorMessage } from '../../errors.js'

export const WEB_TOKEN_PATTERN = /var\s+web_token\s*=\s*["']([a-f0-9]+)["']/i

/**
 * First token assignment in a page, or null.
 */
export function extractWebToken(html: string): string | null {
  const match = html.match(WEB_TOKEN_PATTERN)
  return match ? match[1] : null
}

/** Enough of a token to tell two apart in logs */
export function tokenPreview(token: string): string {
  return `${token.slice(0, 6)}…`
}

export interface TokenAcquirerDeps {
  fetcher: Fetcher
  politeness: Politeness
  logger?: ILogger
}

export class TokenAcquirer implements TokenSource {
  private readonly fetcher: Fetcher
  private readonly politeness: Politeness
  private readonly log: ILogger

  constructor(deps: TokenAcquirerDeps) {
    this.fetcher = deps.fetcher
    this.politeness = deps.politeness
    this.log = deps.logger ?? silentLogger
  }

  /**
   * Fetch the homepage and pull out the token. Never throws: any failure
   * is logged and reported as null. The caller persists the result.
   */
  async acquire(store: Store): Promise<string | null> {
    const log = this.log.child({ storeId: store.id, storeName: store.name })

    try {
      const result = await this.fetcher.request(store.baseUrl)

      if (result.status !== 'ok' || result.body === undefined) {
        log.warn('Homepage fetch failed', {
          status: result.status,
          statusCode: result.statusCode,
          error: result.error,
        })
        return null
      }

      const token = extractWebToken(result.body)
      if (!token) {
        log.warn('No web_token assignment found on homepage')
        return null
      }

      log.info('Token extracted', { tokenPreview: tokenPreview(token) })
      return token
    } catch (error) {
      log.error('Token acquisition failed', { error: errorMessage(error) })
      return null
    } finally {
      await this.politeness.pause()
    }
  }
}

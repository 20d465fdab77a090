/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch API for HTTP requests.
 * Supports GET and form-encoded POST, timeout, size limits, retries,
 * and a configurable User-Agent.
 *
 * A 403 is reported as `forbidden` and never retried: on storefront product
 * endpoints it means the session token has expired.
 */

import type { Fetcher, FetchOptions, FetchResult, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_MAX_SIZE_BYTES, DEFAULT_RETRY_POLICY } from '../types.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Default request timeout (default: 30000) */
  timeoutMs?: number

  userAgent?: string

  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>
}

/**
 * HTTP-based fetcher using native fetch.
 */
export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly timeoutMs: number
  private readonly userAgent?: string
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutMs = options.timeoutMs ?? 30000
    this.userAgent = options.userAgent
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
  }

  /**
   * Issue a request and return the body text.
   */
  async request(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()

    const headers: Record<string, string> = {
      ...DEFAULT_FETCH_HEADERS,
      ...(this.userAgent ? { 'User-Agent': this.userAgent } : {}),
      ...(options.form ? { 'Content-Type': 'application/x-www-form-urlencoded' } : {}),
      ...(options.headers ?? {}),
    }

    let lastError: Error | null = null

    // Retry loop
    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      try {
        const result = await this.fetchOnce(url, headers, options, startTime)

        if (
          result.status === 'error' &&
          result.statusCode &&
          this.retryPolicy.retryableStatusCodes.includes(result.statusCode) &&
          attempt < this.retryPolicy.maxAttempts
        ) {
          await this.sleep(this.backoff(attempt))
          continue
        }

        return result
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error))

        // Retry on network errors
        if (attempt < this.retryPolicy.maxAttempts) {
          await this.sleep(this.backoff(attempt))
          continue
        }
      }
    }

    // All retries exhausted
    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError?.message ?? 'Unknown error after retries',
    }
  }

  private backoff(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    options: FetchOptions,
    startTime: number
  ): Promise<FetchResult> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
    const method = options.method ?? (options.form ? 'POST' : 'GET')

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: options.form ? new URLSearchParams(options.form).toString() : undefined,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status === 403) {
        await response.body?.cancel()
        return {
          status: 'forbidden',
          statusCode: 403,
          durationMs: Date.now() - startTime,
          error: 'HTTP 403: Forbidden',
        }
      }

      // Check for non-success status codes
      if (!response.ok) {
        await response.body?.cancel()
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      // Check content length header for early size check
      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        await response.body?.cancel()
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await this.readBodyWithLimit(response, maxSizeBytes)
      if (body === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        body,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      const decoder = new TextDecoder('utf-8')
      return decoder.decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}

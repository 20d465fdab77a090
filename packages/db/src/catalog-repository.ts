/**
 * Catalog persistence.
 *
 * Every write is idempotent: categories are insert-ignore on
 * (store_id, category_slug) and products upsert on (store_id, product_id),
 * so overlapping syncs and re-runs converge on one row per key.
 */

import type { QueryResultRow } from 'pg'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { PoolLike } from './client.js'
import { DEFAULT_CONTENTION_RETRY, withContentionRetry, type ContentionRetryPolicy } from './retry.js'
import type { CatalogSource, Category, CategoryDraft, ProductRecord, Store } from './types.js'

export interface CatalogRepository {
  listStores(): Promise<Store[]>
  listStoresWithoutCredential(): Promise<Store[]>
  getStore(storeId: number): Promise<Store | null>
  listCategories(storeId: number): Promise<Category[]>
  /** Returns the number of rows actually inserted (existing slugs are ignored) */
  insertCategories(drafts: CategoryDraft[]): Promise<number>
  /** Returns the number of distinct products written */
  upsertProducts(products: ProductRecord[], syncedAt: Date): Promise<number>
  updateStoreCredential(storeId: number, credential: string, fetchedAt: Date): Promise<void>
  /** Marks inactive every product of the category not seen since `syncedBefore` */
  deactivateMissingProducts(storeId: number, categoryId: number, syncedBefore: Date): Promise<number>
  countProducts(storeId: number): Promise<number>
  close(): Promise<void>
}

export interface PgCatalogRepositoryOptions {
  retry?: ContentionRetryPolicy
  logger?: ILogger
  sleep?: (ms: number) => Promise<void>
}

interface StoreRow extends QueryResultRow {
  store_id: number
  store_name: string
  store_slug: string
  base_url: string
  api_endpoint: string | null
  catalog_source: string
  web_token: string | null
  token_last_fetched_at: Date | null
  category_filter: unknown
}

interface CategoryRow extends QueryResultRow {
  category_id: number
  store_id: number
  external_category_id: string | null
  category_name: string
  category_slug: string
  category_url: string | null
}

interface CountRow extends QueryResultRow {
  count: string
}

/** Postgres caps a statement at 65535 bind parameters */
export const UPSERT_CHUNK_SIZE = 500

const PRODUCT_COLUMNS = [
  'store_id',
  'category_id',
  'product_id',
  'product_name',
  'product_url',
  'image_url',
  'current_price',
  'original_price',
  'size',
  'stock_status',
] as const

const STORE_COLUMNS = `
  store_id, store_name, store_slug, base_url, api_endpoint, catalog_source,
  web_token, token_last_fetched_at, category_filter`

function toCatalogSource(value: string): CatalogSource {
  return value === 'woocommerce' ? 'woocommerce' : 'listing_page'
}

/**
 * category_filter is JSONB; older rows hold the list as a JSON-encoded string.
 */
export function parseCategoryFilter(value: unknown): string[] | null {
  let parsed = value
  if (typeof parsed === 'string') {
    if (parsed.trim() === '') return null
    try {
      parsed = JSON.parse(parsed)
    } catch {
      return null
    }
  }
  if (!Array.isArray(parsed)) return null
  const names = parsed.filter((item): item is string => typeof item === 'string')
  return names.length > 0 ? names : null
}

function toStore(row: StoreRow): Store {
  return {
    id: row.store_id,
    name: row.store_name,
    slug: row.store_slug,
    baseUrl: row.base_url,
    apiEndpoint: row.api_endpoint,
    catalogSource: toCatalogSource(row.catalog_source),
    credential: row.web_token ? row.web_token : null,
    credentialFetchedAt: row.token_last_fetched_at,
    categoryFilter: parseCategoryFilter(row.category_filter),
  }
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.category_id,
    storeId: row.store_id,
    externalId: row.external_category_id,
    name: row.category_name,
    slug: row.category_slug,
    url: row.category_url,
  }
}

/**
 * Collapse duplicate (storeId, productId) keys, keeping the last record.
 * ON CONFLICT DO UPDATE cannot touch the same row twice in one statement.
 */
export function dedupeProducts(products: ProductRecord[]): ProductRecord[] {
  const byKey = new Map<string, ProductRecord>()
  for (const product of products) {
    const key = `${product.storeId}:${product.productId}`
    byKey.delete(key)
    byKey.set(key, product)
  }
  return [...byKey.values()]
}

/**
 * Build one multi-row upsert. `$1` is the sync timestamp shared by every row.
 */
export function buildProductUpsert(
  products: ProductRecord[],
  syncedAt: Date
): { text: string; values: unknown[] } {
  const values: unknown[] = [syncedAt]
  const tuples: string[] = []

  for (const product of products) {
    const base = values.length
    values.push(
      product.storeId,
      product.categoryId,
      product.productId,
      product.name,
      product.url,
      product.imageUrl,
      product.currentPrice,
      product.originalPrice,
      product.size,
      product.stockStatus
    )
    const placeholders = PRODUCT_COLUMNS.map((_, i) => `$${base + i + 1}`)
    tuples.push(`(${placeholders.join(', ')}, TRUE, $1, $1, $1)`)
  }

  const text = `INSERT INTO products (${PRODUCT_COLUMNS.join(', ')}, is_active, last_synced_at, created_at, updated_at)
VALUES ${tuples.join(',\n       ')}
ON CONFLICT (store_id, product_id) DO UPDATE SET
  category_id = EXCLUDED.category_id,
  product_name = EXCLUDED.product_name,
  product_url = EXCLUDED.product_url,
  image_url = EXCLUDED.image_url,
  current_price = EXCLUDED.current_price,
  original_price = EXCLUDED.original_price,
  size = EXCLUDED.size,
  stock_status = EXCLUDED.stock_status,
  is_active = TRUE,
  last_synced_at = EXCLUDED.last_synced_at,
  updated_at = EXCLUDED.updated_at`

  return { text, values }
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

export class PgCatalogRepository implements CatalogRepository {
  private readonly pool: PoolLike
  private readonly retry: ContentionRetryPolicy
  private readonly logger: ILogger
  private readonly sleep?: (ms: number) => Promise<void>

  constructor(pool: PoolLike, options: PgCatalogRepositoryOptions = {}) {
    this.pool = pool
    this.retry = options.retry ?? DEFAULT_CONTENTION_RETRY
    this.logger = options.logger ?? silentLogger
    this.sleep = options.sleep
  }

  private withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withContentionRetry(fn, {
      operation,
      policy: this.retry,
      logger: this.logger,
      sleep: this.sleep,
    })
  }

  async listStores(): Promise<Store[]> {
    const result = await this.withRetry('listStores', () =>
      this.pool.query<StoreRow>(`SELECT ${STORE_COLUMNS} FROM stores ORDER BY store_id`)
    )
    return result.rows.map(toStore)
  }

  async listStoresWithoutCredential(): Promise<Store[]> {
    const result = await this.withRetry('listStoresWithoutCredential', () =>
      this.pool.query<StoreRow>(
        `SELECT ${STORE_COLUMNS} FROM stores
         WHERE web_token IS NULL OR web_token = ''
         ORDER BY store_id`
      )
    )
    return result.rows.map(toStore)
  }

  async getStore(storeId: number): Promise<Store | null> {
    const result = await this.withRetry('getStore', () =>
      this.pool.query<StoreRow>(`SELECT ${STORE_COLUMNS} FROM stores WHERE store_id = $1`, [storeId])
    )
    const row = result.rows[0]
    return row ? toStore(row) : null
  }

  async listCategories(storeId: number): Promise<Category[]> {
    const result = await this.withRetry('listCategories', () =>
      this.pool.query<CategoryRow>(
        `SELECT category_id, store_id, external_category_id, category_name, category_slug, category_url
         FROM categories
         WHERE store_id = $1
         ORDER BY category_id`,
        [storeId]
      )
    )
    return result.rows.map(toCategory)
  }

  async insertCategories(drafts: CategoryDraft[]): Promise<number> {
    if (drafts.length === 0) return 0

    const values: unknown[] = []
    const tuples = drafts.map(draft => {
      const base = values.length
      values.push(draft.storeId, draft.externalId, draft.name, draft.slug, draft.url)
      return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5})`
    })

    const result = await this.withRetry('insertCategories', () =>
      this.pool.query(
        `INSERT INTO categories (store_id, external_category_id, category_name, category_slug, category_url)
         VALUES ${tuples.join(', ')}
         ON CONFLICT (store_id, category_slug) DO NOTHING`,
        values
      )
    )
    return result.rowCount ?? 0
  }

  async upsertProducts(products: ProductRecord[], syncedAt: Date): Promise<number> {
    const rows = dedupeProducts(products)
    if (rows.length === 0) return 0

    return this.withRetry('upsertProducts', async () => {
      const client = await this.pool.connect()
      try {
        await client.query('BEGIN')
        let written = 0
        for (const batch of chunk(rows, UPSERT_CHUNK_SIZE)) {
          const { text, values } = buildProductUpsert(batch, syncedAt)
          const result = await client.query(text, values)
          written += result.rowCount ?? batch.length
        }
        await client.query('COMMIT')
        return written
      } catch (error) {
        try {
          await client.query('ROLLBACK')
        } catch (rollbackError) {
          this.logger.warn('Rollback failed', { operation: 'upsertProducts' }, rollbackError)
        }
        throw error
      } finally {
        client.release()
      }
    })
  }

  async updateStoreCredential(storeId: number, credential: string, fetchedAt: Date): Promise<void> {
    await this.withRetry('updateStoreCredential', () =>
      this.pool.query(
        `UPDATE stores
         SET web_token = $2, token_last_fetched_at = $3, updated_at = $3
         WHERE store_id = $1`,
        [storeId, credential, fetchedAt]
      )
    )
  }

  async deactivateMissingProducts(storeId: number, categoryId: number, syncedBefore: Date): Promise<number> {
    const result = await this.withRetry('deactivateMissingProducts', () =>
      this.pool.query(
        `UPDATE products
         SET is_active = FALSE, updated_at = now()
         WHERE store_id = $1 AND category_id = $2 AND is_active = TRUE AND last_synced_at < $3`,
        [storeId, categoryId, syncedBefore]
      )
    )
    return result.rowCount ?? 0
  }

  async countProducts(storeId: number): Promise<number> {
    const result = await this.withRetry('countProducts', () =>
      this.pool.query<CountRow>('SELECT COUNT(*) AS count FROM products WHERE store_id = $1', [storeId])
    )
    return Number(result.rows[0]?.count ?? 0)
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}

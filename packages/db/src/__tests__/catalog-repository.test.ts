import { describe, expect, it, vi } from 'vitest'
import type { QueryResult, QueryResultRow } from 'pg'
import type { PoolClientLike, PoolLike } from '../client.js'
import {
  buildProductUpsert,
  dedupeProducts,
  parseCategoryFilter,
  PgCatalogRepository,
  UPSERT_CHUNK_SIZE,
} from '../catalog-repository.js'
import { PersistenceError } from '../errors.js'
import type { ProductRecord } from '../types.js'

interface RecordedQuery {
  text: string
  values?: unknown[]
  via: 'pool' | 'client'
}

interface FakeResult {
  rows?: QueryResultRow[]
  rowCount?: number
}

type Handler = (text: string, values: unknown[] | undefined) => FakeResult

/**
 * In-process stand-in for pg.Pool. Every statement is recorded and answered by `handler`.
 */
class FakePool implements PoolLike {
  readonly queries: RecordedQuery[] = []
  released = 0
  ended = false

  constructor(private readonly handler: Handler = () => ({})) {}

  private run<R extends QueryResultRow>(
    via: RecordedQuery['via'],
    text: string,
    values?: unknown[]
  ): QueryResult<R> {
    this.queries.push({ text, values, via })
    const { rows = [], rowCount = rows.length } = this.handler(text, values)
    return { command: '', oid: 0, fields: [], rowCount, rows: rows as R[] }
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    return this.run<R>('pool', text, values)
  }

  async connect(): Promise<PoolClientLike> {
    return {
      query: async <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
        this.run<R>('client', text, values),
      release: () => {
        this.released++
      },
    }
  }

  async end(): Promise<void> {
    this.ended = true
  }
}

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code })
}

function product(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    storeId: 1,
    categoryId: 10,
    productId: 'p1',
    name: 'Linen Shirt',
    url: 'https://shop.test/linen-shirt.html',
    imageUrl: 'https://shop.test/img/linen.jpg',
    currentPrice: 1500,
    originalPrice: null,
    size: 'M',
    stockStatus: 'in_stock',
    ...overrides,
  }
}

const storeRow = {
  store_id: 4,
  store_name: 'Corner Boutique',
  store_slug: 'corner-boutique',
  base_url: 'https://corner.test',
  api_endpoint: '/wp-json/wc/store',
  catalog_source: 'woocommerce',
  web_token: '',
  token_last_fetched_at: null,
  category_filter: '["Dresses","Tops"]',
}

const noSleep = async (): Promise<void> => {}

describe('parseCategoryFilter', () => {
  it('accepts arrays and JSON-encoded arrays', () => {
    expect(parseCategoryFilter(['A', 'B'])).toEqual(['A', 'B'])
    expect(parseCategoryFilter('["A"]')).toEqual(['A'])
  })

  it('returns null for empty or malformed values', () => {
    expect(parseCategoryFilter(null)).toBeNull()
    expect(parseCategoryFilter('')).toBeNull()
    expect(parseCategoryFilter('not json')).toBeNull()
    expect(parseCategoryFilter([])).toBeNull()
    expect(parseCategoryFilter({ name: 'A' })).toBeNull()
  })
})

describe('dedupeProducts', () => {
  it('keeps the last record for a repeated key', () => {
    const rows = dedupeProducts([
      product({ productId: 'p1', currentPrice: 10 }),
      product({ productId: 'p2' }),
      product({ productId: 'p1', currentPrice: 12 }),
    ])

    expect(rows.map(row => [row.productId, row.currentPrice])).toEqual([
      ['p2', 1500],
      ['p1', 12],
    ])
  })

  it('treats the same product id in different stores as distinct', () => {
    expect(dedupeProducts([product({ storeId: 1 }), product({ storeId: 2 })])).toHaveLength(2)
  })
})

describe('buildProductUpsert', () => {
  it('keys the upsert on (store_id, product_id) and reactivates rows', () => {
    const syncedAt = new Date('2026-01-01T00:00:00Z')
    const { text, values } = buildProductUpsert(
      [product(), product({ productId: 'p2', originalPrice: 2000, stockStatus: 'out_of_stock' })],
      syncedAt
    )

    expect(values).toHaveLength(21)
    expect(values[0]).toBe(syncedAt)
    expect(values.slice(11)).toEqual([
      1,
      10,
      'p2',
      'Linen Shirt',
      'https://shop.test/linen-shirt.html',
      'https://shop.test/img/linen.jpg',
      1500,
      2000,
      'M',
      'out_of_stock',
    ])
    expect(text).toContain('($2, $3, $4, $5, $6, $7, $8, $9, $10, $11, TRUE, $1, $1, $1)')
    expect(text).toContain('($12, $13, $14, $15, $16, $17, $18, $19, $20, $21, TRUE, $1, $1, $1)')
    expect(text).toContain('ON CONFLICT (store_id, product_id) DO UPDATE SET')
    expect(text).toContain('  is_active = TRUE,')
    expect(text).toContain('  updated_at = EXCLUDED.updated_at')
  })
})

describe('PgCatalogRepository', () => {
  it('maps store rows', async () => {
    const pool = new FakePool(() => ({ rows: [storeRow] }))
    const repo = new PgCatalogRepository(pool)

    const stores = await repo.listStores()

    expect(stores).toEqual([
      {
        id: 4,
        name: 'Corner Boutique',
        slug: 'corner-boutique',
        baseUrl: 'https://corner.test',
        apiEndpoint: '/wp-json/wc/store',
        catalogSource: 'woocommerce',
        credential: null,
        credentialFetchedAt: null,
        categoryFilter: ['Dresses', 'Tops'],
      },
    ])
    expect(pool.queries[0].text).toContain('ORDER BY store_id')
  })

  it('returns null for an unknown store', async () => {
    const pool = new FakePool(() => ({ rows: [] }))
    const repo = new PgCatalogRepository(pool)

    await expect(repo.getStore(99)).resolves.toBeNull()
    expect(pool.queries[0].values).toEqual([99])
  })

  it('selects stores with a missing or empty token', async () => {
    const pool = new FakePool(() => ({ rows: [] }))
    await new PgCatalogRepository(pool).listStoresWithoutCredential()

    expect(pool.queries[0].text).toContain("WHERE web_token IS NULL OR web_token = ''")
  })

  it('maps category rows', async () => {
    const pool = new FakePool(() => ({
      rows: [
        {
          category_id: 10,
          store_id: 4,
          external_category_id: '17',
          category_name: 'Dresses',
          category_slug: 'dresses',
          category_url: null,
        },
      ],
    }))

    await expect(new PgCatalogRepository(pool).listCategories(4)).resolves.toEqual([
      { id: 10, storeId: 4, externalId: '17', name: 'Dresses', slug: 'dresses', url: null },
    ])
    expect(pool.queries[0].values).toEqual([4])
  })

  it('inserts categories with insert-ignore semantics', async () => {
    const pool = new FakePool(() => ({ rowCount: 1 }))
    const repo = new PgCatalogRepository(pool)

    const inserted = await repo.insertCategories([
      { storeId: 4, externalId: 'tops', name: 'Tops', slug: 'tops', url: 'https://corner.test/tops.html' },
      { storeId: 4, externalId: 'dresses', name: 'Dresses', slug: 'dresses', url: 'https://corner.test/dresses.html' },
    ])

    expect(inserted).toBe(1)
    expect(pool.queries).toHaveLength(1)
    expect(pool.queries[0].text).toContain('ON CONFLICT (store_id, category_slug) DO NOTHING')
    expect(pool.queries[0].text).toContain('($1, $2, $3, $4, $5), ($6, $7, $8, $9, $10)')
    expect(pool.queries[0].values).toEqual([
      4, 'tops', 'Tops', 'tops', 'https://corner.test/tops.html',
      4, 'dresses', 'Dresses', 'dresses', 'https://corner.test/dresses.html',
    ])
  })

  it('skips the round trip for an empty category list', async () => {
    const pool = new FakePool()
    await expect(new PgCatalogRepository(pool).insertCategories([])).resolves.toBe(0)
    expect(pool.queries).toHaveLength(0)
  })

  it('upserts deduplicated products in one transaction', async () => {
    const pool = new FakePool((text, values) =>
      text.startsWith('INSERT') && values ? { rowCount: (values.length - 1) / 10 } : {}
    )
    const repo = new PgCatalogRepository(pool)

    const written = await repo.upsertProducts(
      [product({ productId: 'p1' }), product({ productId: 'p2' }), product({ productId: 'p1', currentPrice: 900 })],
      new Date('2026-01-01T00:00:00Z')
    )

    expect(written).toBe(2)
    expect(pool.queries.map(q => q.text.split('\n')[0].split(' (')[0])).toEqual([
      'BEGIN',
      'INSERT INTO products',
      'COMMIT',
    ])
    expect(pool.queries.every(q => q.via === 'client')).toBe(true)
    expect(pool.queries[1].values?.[3]).toBe('p2')
    expect(pool.queries[1].values?.[13]).toBe('p1')
    expect(pool.queries[1].values?.[17]).toBe(900)
    expect(pool.released).toBe(1)
  })

  it('splits large batches across statements inside the same transaction', async () => {
    const pool = new FakePool((text, values) =>
      text.startsWith('INSERT') && values ? { rowCount: (values.length - 1) / 10 } : {}
    )
    const products = Array.from({ length: UPSERT_CHUNK_SIZE + 1 }, (_, i) => product({ productId: `p${i}` }))

    const written = await new PgCatalogRepository(pool).upsertProducts(products, new Date())

    expect(written).toBe(UPSERT_CHUNK_SIZE + 1)
    expect(pool.queries.filter(q => q.text === 'BEGIN')).toHaveLength(1)
    expect(pool.queries.filter(q => q.text.startsWith('INSERT'))).toHaveLength(2)
    expect(pool.queries.filter(q => q.text === 'COMMIT')).toHaveLength(1)
  })

  it('does nothing for an empty product list', async () => {
    const pool = new FakePool()
    await expect(new PgCatalogRepository(pool).upsertProducts([], new Date())).resolves.toBe(0)
    expect(pool.queries).toHaveLength(0)
  })

  it('rolls back and surfaces a PersistenceError on constraint failures', async () => {
    const pool = new FakePool(text => {
      if (text.startsWith('INSERT')) throw pgError('violates check constraint', '23514')
      return {}
    })
    const repo = new PgCatalogRepository(pool, { sleep: noSleep })

    await expect(repo.upsertProducts([product()], new Date())).rejects.toBeInstanceOf(PersistenceError)
    expect(pool.queries.map(q => q.text.split(' ')[0])).toEqual(['BEGIN', 'INSERT', 'ROLLBACK'])
    expect(pool.released).toBe(1)
  })

  it('retries the whole transaction after a deadlock', async () => {
    let inserts = 0
    const pool = new FakePool(text => {
      if (text.startsWith('INSERT')) {
        inserts++
        if (inserts === 1) throw pgError('deadlock detected', '40P01')
        return { rowCount: 1 }
      }
      return {}
    })
    const sleep = vi.fn(noSleep)
    const repo = new PgCatalogRepository(pool, { sleep })

    await expect(repo.upsertProducts([product()], new Date())).resolves.toBe(1)
    expect(pool.queries.map(q => q.text.split(' ')[0])).toEqual([
      'BEGIN',
      'INSERT',
      'ROLLBACK',
      'BEGIN',
      'INSERT',
      'COMMIT',
    ])
    expect(pool.released).toBe(2)
    expect(sleep).toHaveBeenCalledWith(200)
  })

  it('records the credential and fetch time', async () => {
    const pool = new FakePool()
    const fetchedAt = new Date('2026-02-03T04:05:06Z')

    await new PgCatalogRepository(pool).updateStoreCredential(4, 'a1b2c3', fetchedAt)

    expect(pool.queries[0].text).toContain('SET web_token = $2, token_last_fetched_at = $3, updated_at = $3')
    expect(pool.queries[0].values).toEqual([4, 'a1b2c3', fetchedAt])
  })

  it('deactivates products not seen since the cutoff', async () => {
    const pool = new FakePool(() => ({ rowCount: 3 }))
    const cutoff = new Date('2026-01-01T00:00:00Z')

    await expect(new PgCatalogRepository(pool).deactivateMissingProducts(4, 10, cutoff)).resolves.toBe(3)
    expect(pool.queries[0].text).toContain('SET is_active = FALSE')
    expect(pool.queries[0].values).toEqual([4, 10, cutoff])
  })

  it('converts the COUNT string to a number', async () => {
    const pool = new FakePool(() => ({ rows: [{ count: '17' }] }))
    await expect(new PgCatalogRepository(pool).countProducts(4)).resolves.toBe(17)
  })

  it('ends the pool on close', async () => {
    const pool = new FakePool()
    await new PgCatalogRepository(pool).close()
    expect(pool.ended).toBe(true)
  })
})

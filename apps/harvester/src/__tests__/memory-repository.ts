import type { CatalogRepository, Category, CategoryDraft, ProductRecord, Store } from '@shopsweep/db'

export interface StoredProduct extends ProductRecord {
  isActive: boolean
  lastSyncedAt: Date
  createdAt: Date
  updatedAt: Date
}

/**
 * In-process CatalogRepository with the same key semantics as the Postgres
 * one: one category per (store, slug), one product per (store, productId).
 */
export class MemoryCatalogRepository implements CatalogRepository {
  readonly stores = new Map<number, Store>()
  readonly categories: Category[] = []
  readonly products = new Map<string, StoredProduct>()
  readonly credentialUpdates: Array<{ storeId: number; credential: string }> = []
  upsertCalls = 0
  closed = false
  private nextCategoryId = 1

  constructor(stores: Store[] = []) {
    for (const store of stores) this.stores.set(store.id, { ...store })
  }

  addCategories(storeId: number, slugs: string[]): Category[] {
    return slugs.map(slug => {
      const category: Category = {
        id: this.nextCategoryId++,
        storeId,
        externalId: slug,
        name: slug,
        slug,
        url: null,
      }
      this.categories.push(category)
      return category
    })
  }

  async listStores(): Promise<Store[]> {
    return [...this.stores.values()]
  }

  async listStoresWithoutCredential(): Promise<Store[]> {
    return [...this.stores.values()].filter(store => !store.credential)
  }

  async getStore(storeId: number): Promise<Store | null> {
    return this.stores.get(storeId) ?? null
  }

  async listCategories(storeId: number): Promise<Category[]> {
    return this.categories.filter(category => category.storeId === storeId)
  }

  async insertCategories(drafts: CategoryDraft[]): Promise<number> {
    let inserted = 0
    for (const draft of drafts) {
      const exists = this.categories.some(c => c.storeId === draft.storeId && c.slug === draft.slug)
      if (exists) continue
      this.categories.push({ ...draft, id: this.nextCategoryId++ })
      inserted++
    }
    return inserted
  }

  async upsertProducts(products: ProductRecord[], syncedAt: Date): Promise<number> {
    this.upsertCalls++
    const keys = new Set<string>()
    for (const product of products) {
      const key = `${product.storeId}:${product.productId}`
      keys.add(key)
      const existing = this.products.get(key)
      this.products.set(key, {
        ...product,
        isActive: true,
        lastSyncedAt: syncedAt,
        createdAt: existing?.createdAt ?? syncedAt,
        updatedAt: syncedAt,
      })
    }
    return keys.size
  }

  async updateStoreCredential(storeId: number, credential: string, fetchedAt: Date): Promise<void> {
    this.credentialUpdates.push({ storeId, credential })
    const store = this.stores.get(storeId)
    if (store) {
      this.stores.set(storeId, { ...store, credential, credentialFetchedAt: fetchedAt })
    }
  }

  async deactivateMissingProducts(storeId: number, categoryId: number, syncedBefore: Date): Promise<number> {
    let count = 0
    for (const product of this.products.values()) {
      if (
        product.storeId === storeId &&
        product.categoryId === categoryId &&
        product.isActive &&
        product.lastSyncedAt < syncedBefore
      ) {
        product.isActive = false
        count++
      }
    }
    return count
  }

  async countProducts(storeId: number): Promise<number> {
    return [...this.products.values()].filter(product => product.storeId === storeId).length
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

export function makeStore(overrides: Partial<Store> = {}): Store {
  return {
    id: 1,
    name: 'Test Store',
    slug: 'test-store',
    baseUrl: 'https://shop.test',
    apiEndpoint: '/api/products',
    catalogSource: 'listing_page',
    credential: 'abc123',
    credentialFetchedAt: null,
    categoryFilter: null,
    ...overrides,
  }
}

export function makeProduct(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    storeId: 1,
    categoryId: 1,
    productId: 'p-1',
    name: 'Linen Shirt',
    url: 'https://shop.test/p-1',
    imageUrl: '',
    currentPrice: 1200,
    originalPrice: null,
    size: '',
    stockStatus: 'in_stock',
    ...overrides,
  }
}

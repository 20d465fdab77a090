import { describe, it, expect, vi } from 'vitest'
import type { Store } from '@shopsweep/db'
import { runProductSync, summarize, type StoreRunner } from '../orchestrator.js'
import type { StoreOutcome } from '../types.js'
import { MemoryCatalogRepository, makeStore } from '../../__tests__/memory-repository.js'

function outcome(store: Store, overrides: Partial<StoreOutcome> = {}): StoreOutcome {
  return {
    storeId: store.id,
    storeName: store.name,
    productCount: 10,
    success: true,
    categoriesTotal: 1,
    categoriesSucceeded: 1,
    categoriesFailed: 0,
    credentialRefreshes: 0,
    productsDeactivated: 0,
    durationMs: 1,
    ...overrides,
  }
}

const stores = [1, 2, 3, 4, 5].map(id => makeStore({ id, name: `Store ${id}` }))

describe('summarize', () => {
  it('counts skipped stores and sums products across outcomes', () => {
    const summary = summarize(
      'run-1',
      4,
      [outcome(stores[0]), outcome(stores[1], { success: false, reason: 'credential_expired', productCount: 3 })],
      50
    )

    expect(summary).toMatchObject({
      runId: 'run-1',
      totalStores: 4,
      succeeded: 1,
      failed: 1,
      skipped: 2,
      totalProducts: 13,
      durationMs: 50,
    })
  })
})

describe('runProductSync', () => {
  it('runs every configured store and accounts for each one', async () => {
    const repository = new MemoryCatalogRepository(stores)
    const worker: StoreRunner = {
      run: vi.fn(async (store: Store) =>
        store.id === 3 ? outcome(store, { success: false, reason: 'no_categories', productCount: 0 }) : outcome(store)
      ),
    }

    const summary = await runProductSync({ repository, worker, maxWorkers: 2, runId: 'run-abc' })

    expect(summary.runId).toBe('run-abc')
    expect(summary.totalStores).toBe(5)
    expect(summary.succeeded).toBe(4)
    expect(summary.failed).toBe(1)
    expect(summary.succeeded + summary.failed).toBe(5)
    expect(summary.totalProducts).toBe(40)
    expect(summary.outcomes.map(o => o.storeId).sort()).toEqual([1, 2, 3, 4, 5])
  })

  it('passes the run id to each store', async () => {
    const run = vi.fn(async (store: Store) => outcome(store))

    await runProductSync({
      repository: new MemoryCatalogRepository(),
      worker: { run },
      maxWorkers: 1,
      stores: [stores[0]],
      runId: 'run-xyz',
    })

    expect(run).toHaveBeenCalledWith(stores[0], { runId: 'run-xyz' })
  })

  it('contains a worker that throws', async () => {
    const worker: StoreRunner = {
      run: vi.fn(async (store: Store) => {
        if (store.id === 2) throw new Error('unexpected')
        return outcome(store)
      }),
    }

    const summary = await runProductSync({
      repository: new MemoryCatalogRepository(stores),
      worker,
      maxWorkers: 3,
    })

    expect(summary.succeeded).toBe(4)
    expect(summary.failed).toBe(1)
    expect(summary.outcomes.find(o => o.storeId === 2)).toMatchObject({
      success: false,
      reason: 'unexpected_error',
      productCount: 0,
    })
  })

  it('stops starting stores once aborted', async () => {
    const controller = new AbortController()
    const worker: StoreRunner = {
      run: vi.fn(async (store: Store) => {
        if (store.id === 2) controller.abort()
        return outcome(store)
      }),
    }

    const summary = await runProductSync({
      repository: new MemoryCatalogRepository(stores),
      worker,
      maxWorkers: 1,
      signal: controller.signal,
    })

    expect(worker.run).toHaveBeenCalledTimes(2)
    expect(summary).toMatchObject({ totalStores: 5, succeeded: 2, failed: 0, skipped: 3 })
  })

  it('returns an empty summary when there are no stores', async () => {
    const worker: StoreRunner = { run: vi.fn() }

    const summary = await runProductSync({
      repository: new MemoryCatalogRepository(),
      worker,
      maxWorkers: 4,
    })

    expect(summary).toMatchObject({ totalStores: 0, succeeded: 0, failed: 0, skipped: 0, totalProducts: 0 })
    expect(worker.run).not.toHaveBeenCalled()
  })

  it('only runs the stores it is given', async () => {
    const run = vi.fn(async (store: Store) => outcome(store))

    const summary = await runProductSync({
      repository: new MemoryCatalogRepository(stores),
      worker: { run },
      maxWorkers: 4,
      stores: [stores[4]],
    })

    expect(run).toHaveBeenCalledTimes(1)
    expect(summary.outcomes.map(o => o.storeId)).toEqual([5])
  })
})

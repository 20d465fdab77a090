import type { Store } from '@shopsweep/db'
import { loggers } from '../../config/logger.js'
import { runProductSync } from '../../scraper/orchestrator.js'
import type { CommandContext } from '../context.js'

export interface SyncCommandArgs {
  storeId?: number
}

/**
 * Run a product sync over every store, or one store.
 * Exits 1 when the run was interrupted before every store started or the
 * requested store does not exist.
 */
export async function runSyncCommand(args: SyncCommandArgs, ctx: CommandContext): Promise<number> {
  let stores: Store[] | undefined
  if (args.storeId !== undefined) {
    const store = await ctx.repository.getStore(args.storeId)
    if (!store) {
      console.error(`Store ${args.storeId} not found`)
      return 1
    }
    stores = [store]
  }

  const summary = await runProductSync({
    repository: ctx.repository,
    worker: ctx.runtime.storeWorker,
    maxWorkers: ctx.settings.maxWorkers,
    stores,
    signal: ctx.signal,
    logger: loggers.sync,
  })

  for (const outcome of summary.outcomes) {
    const status = outcome.success ? 'ok' : `failed (${outcome.reason ?? 'unknown'})`
    console.log(`${outcome.storeName}: ${status}, ${outcome.productCount} products`)
  }
  console.log(
    `Synced ${summary.totalProducts} products: ${summary.succeeded} stores succeeded, ` +
      `${summary.failed} failed, ${summary.skipped} skipped`
  )

  return summary.skipped > 0 ? 1 : 0
}

import { closeQueues, enqueueStoreBootstrap } from '../../config/queues.js'
import { loggers } from '../../config/logger.js'
import { bootstrapStore } from '../../scraper/bootstrap.js'
import type { CommandContext } from '../context.js'

export interface BootstrapCommandArgs {
  storeId?: number
  /** Run in this process instead of queueing a job for the worker */
  inline: boolean
}

export async function runBootstrapCommand(
  args: BootstrapCommandArgs,
  ctx: CommandContext,
  enqueue: (storeId: number) => Promise<string | undefined> = enqueueStoreBootstrap
): Promise<number> {
  if (args.storeId === undefined) {
    console.error('bootstrap requires --store-id <id>')
    return 2
  }

  const store = await ctx.repository.getStore(args.storeId)
  if (!store) {
    console.error(`Store ${args.storeId} not found`)
    return 1
  }

  if (args.inline) {
    const result = await bootstrapStore(store.id, {
      repository: ctx.repository,
      tokens: ctx.runtime.tokens,
      categoryExtractorFor: ctx.runtime.categoryExtractorFor,
      logger: loggers.bootstrap,
    })
    const token = result.tokenAcquired === null ? 'kept' : result.tokenAcquired ? 'acquired' : 'unavailable'
    console.log(`${store.name}: token ${token}, ${result.extracted} categories found, ${result.inserted} new`)
    return result.tokenAcquired === false || result.extracted === 0 ? 1 : 0
  }

  try {
    const jobId = await enqueue(store.id)
    console.log(`Queued bootstrap for ${store.name} (job ${jobId ?? 'unknown'})`)
    return 0
  } finally {
    await closeQueues()
  }
}

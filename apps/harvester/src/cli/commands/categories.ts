import type { Store } from '@shopsweep/db'
import { loggers } from '../../config/logger.js'
import { extractCategories } from '../../scraper/bootstrap.js'
import type { CommandContext } from '../context.js'

export interface CategoriesCommandArgs {
  storeId?: number
}

export async function runCategoriesCommand(args: CategoriesCommandArgs, ctx: CommandContext): Promise<number> {
  let stores: Store[]
  if (args.storeId !== undefined) {
    const store = await ctx.repository.getStore(args.storeId)
    if (!store) {
      console.error(`Store ${args.storeId} not found`)
      return 1
    }
    stores = [store]
  } else {
    stores = await ctx.repository.listStores()
  }

  const deps = {
    repository: ctx.repository,
    tokens: ctx.runtime.tokens,
    categoryExtractorFor: ctx.runtime.categoryExtractorFor,
    logger: loggers.categories,
  }

  let empty = 0
  for (const store of stores) {
    if (ctx.signal.aborted) break
    const result = await extractCategories(store, deps)
    if (result.extracted === 0) empty++
    console.log(`${store.name}: ${result.extracted} categories found, ${result.inserted} new`)
  }

  return empty > 0 ? 1 : 0
}

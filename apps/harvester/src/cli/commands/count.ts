import type { CommandContext } from '../context.js'

export interface CountCommandArgs {
  storeId?: number
}

export async function runCountCommand(args: CountCommandArgs, ctx: CommandContext): Promise<number> {
  if (args.storeId === undefined) {
    console.error('count requires --store-id <id>')
    return 2
  }

  const store = await ctx.repository.getStore(args.storeId)
  if (!store) {
    console.error(`Store ${args.storeId} not found`)
    return 1
  }

  const count = await ctx.repository.countProducts(store.id)
  console.log(`${store.name}: ${count} products`)
  return 0
}

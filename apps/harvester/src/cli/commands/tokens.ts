import { loggers } from '../../config/logger.js'
import { refreshTokens } from '../../scraper/bootstrap.js'
import type { CommandContext } from '../context.js'

export interface TokensCommandArgs {
  /** Refresh every store, not only the ones without a token */
  all: boolean
}

export async function runTokensCommand(args: TokensCommandArgs, ctx: CommandContext): Promise<number> {
  const stores = args.all
    ? await ctx.repository.listStores()
    : await ctx.repository.listStoresWithoutCredential()

  if (stores.length === 0) {
    console.log('No stores need a token')
    return 0
  }

  const summary = await refreshTokens(stores, {
    repository: ctx.repository,
    tokens: ctx.runtime.tokens,
    categoryExtractorFor: ctx.runtime.categoryExtractorFor,
    logger: loggers.tokens,
  })

  console.log(`Tokens acquired for ${summary.acquired}/${summary.attempted} stores`)
  return summary.failed > 0 ? 1 : 0
}

/**
 * Per-invocation resources shared by the CLI commands.
 */

import { DEFAULT_CONTENTION_RETRY, PgCatalogRepository, createPool, type CatalogRepository } from '@shopsweep/db'
import { loggers } from '../config/logger.js'
import { getSettings, type HarvesterSettings } from '../config/settings.js'
import { createRuntime, type HarvesterRuntime } from '../scraper/runtime.js'

export interface CommandContext {
  repository: CatalogRepository
  runtime: HarvesterRuntime
  settings: HarvesterSettings
  /** Aborted on SIGINT/SIGTERM */
  signal: AbortSignal
}

/**
 * Open a repository, wire the runtime and run `command`. The pool is closed
 * and signal handlers removed however the command ends.
 */
export async function withCommandContext(command: (ctx: CommandContext) => Promise<number>): Promise<number> {
  const settings = getSettings()
  const repository = new PgCatalogRepository(createPool(), {
    logger: loggers.db,
    retry: { ...DEFAULT_CONTENTION_RETRY, maxAttempts: settings.dbContentionMaxAttempts },
  })

  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals): void => {
    loggers.cli.warn('Received signal, finishing in-flight stores', { signal })
    controller.abort()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    return await command({
      repository,
      runtime: createRuntime(repository, settings),
      settings,
      signal: controller.signal,
    })
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
    await repository.close()
  }
}

#!/usr/bin/env node

/**
 * Harvester Worker
 * Runs the store bootstrap queue worker and the cron-driven product sync.
 */

// Load environment variables first, before any other imports
import './env.js'

import { DEFAULT_CONTENTION_RETRY, PgCatalogRepository, createPool, warmupDatabase } from '@shopsweep/db'
import { logger, loggers } from './config/logger.js'
import { closeQueues } from './config/queues.js'
import { warmupRedis } from './config/redis.js'
import { getSettings } from './config/settings.js'
import { runProductSync } from './scraper/orchestrator.js'
import { createRuntime } from './scraper/runtime.js'
import { SyncScheduler } from './scraper/scheduler.js'
import { startBootstrapWorker, stopBootstrapWorker } from './scraper/worker.js'
import { errorMessage } from './errors.js'

const settings = getSettings()
const pool = createPool()
const repository = new PgCatalogRepository(pool, {
  logger: loggers.db,
  retry: { ...DEFAULT_CONTENTION_RETRY, maxAttempts: settings.dbContentionMaxAttempts },
})
const runtime = createRuntime(repository, settings)

const scheduler = new SyncScheduler({
  cron: settings.syncCron,
  logger: loggers.scheduler,
  runSync: signal =>
    runProductSync({
      repository,
      worker: runtime.storeWorker,
      maxWorkers: settings.maxWorkers,
      signal,
      logger: loggers.sync,
    }),
})

async function start(): Promise<void> {
  logger.info('Starting harvester worker', {
    maxWorkers: settings.maxWorkers,
    syncCron: settings.syncCron,
    bootstrapConcurrency: settings.bootstrapConcurrency,
  })

  const [dbReady, redisReady] = await Promise.all([warmupDatabase(pool, loggers.db), warmupRedis()])
  if (!dbReady) {
    logger.error('Starting anyway, but expect database errors')
  }
  if (!redisReady) {
    logger.error('Starting anyway, store bootstrap jobs will wait for Redis')
  }

  await startBootstrapWorker(
    {
      repository,
      tokens: runtime.tokens,
      categoryExtractorFor: runtime.categoryExtractorFor,
    },
    { concurrency: settings.bootstrapConcurrency }
  )

  scheduler.start()
  logger.info('Harvester worker running')
}

// Track if shutdown is in progress to prevent double-shutdown
let isShuttingDown = false

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.info('Shutdown already in progress')
    return
  }
  isShuttingDown = true

  logger.info('Starting graceful shutdown', { signal })
  const shutdownStart = Date.now()

  try {
    // 1. Stop scheduling, let in-flight stores finish
    await scheduler.stop()

    // 2. Close the queue worker (waits for the current job)
    await stopBootstrapWorker()
    await closeQueues()

    // 3. Disconnect from database
    await repository.close()

    logger.info('Graceful shutdown complete', { durationMs: Date.now() - shutdownStart })
    process.exit(0)
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) }, error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))

start().catch(error => {
  logger.fatal('Harvester worker failed to start', { error: errorMessage(error) }, error)
  process.exit(1)
})

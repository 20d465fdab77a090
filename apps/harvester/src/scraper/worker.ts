/**
 * Store Bootstrap Worker
 *
 * Processes STORE_BOOTSTRAP jobs from the queue. Each job acquires a token
 * for a newly created store (when it has none) and writes its categories.
 * A missing store fails the job; BullMQ's retry policy covers transient errors.
 */

import { Worker, type Job } from 'bullmq'
import { loggers } from '../config/logger.js'
import { redisConnection } from '../config/redis.js'
import { QUEUE_NAMES, type StoreBootstrapJobData } from '../config/queues.js'
import { bootstrapStore, type BootstrapDeps, type StoreBootstrapResult } from './bootstrap.js'

const log = loggers.bootstrap

let worker: Worker<StoreBootstrapJobData, StoreBootstrapResult> | null = null

/**
 * Process a single bootstrap job.
 */
export async function processBootstrapJob(
  job: Job<StoreBootstrapJobData>,
  deps: BootstrapDeps
): Promise<StoreBootstrapResult> {
  const { storeId } = job.data
  const jobLogger = log.child({ jobId: job.id, storeId })

  jobLogger.info('Processing bootstrap job', { attempt: job.attemptsMade + 1 })

  const result = await bootstrapStore(storeId, { ...deps, logger: jobLogger })

  jobLogger.info('Store bootstrapped', {
    tokenAcquired: result.tokenAcquired,
    extracted: result.extracted,
    inserted: result.inserted,
  })
  return result
}

/**
 * Start the store bootstrap worker.
 */
export async function startBootstrapWorker(
  deps: BootstrapDeps,
  options?: { concurrency?: number }
): Promise<Worker<StoreBootstrapJobData, StoreBootstrapResult>> {
  const concurrency = options?.concurrency ?? 1

  log.info('Starting store bootstrap worker', { concurrency })

  worker = new Worker<StoreBootstrapJobData, StoreBootstrapResult>(
    QUEUE_NAMES.STORE_BOOTSTRAP,
    async job => processBootstrapJob(job, deps),
    {
      connection: redisConnection,
      concurrency,
    }
  )

  worker.on('completed', job => {
    log.debug('Job completed', { jobId: job.id, storeId: job.data.storeId })
  })

  worker.on('failed', (job, error) => {
    log.error('Job failed', {
      jobId: job?.id,
      storeId: job?.data.storeId,
      error: error.message,
    })
  })

  worker.on('error', error => {
    log.error('Worker error', { error: error.message })
  })

  return worker
}

/**
 * Stop the store bootstrap worker.
 */
export async function stopBootstrapWorker(): Promise<void> {
  if (worker) {
    log.info('Stopping store bootstrap worker')
    await worker.close()
    worker = null
  }
}

/**
 * Get worker instance (for testing).
 */
export function getBootstrapWorker(): Worker<StoreBootstrapJobData, StoreBootstrapResult> | null {
  return worker
}

import { Queue } from 'bullmq'
import { redisConnection } from './redis.js'

// Queue names
export const QUEUE_NAMES = {
  STORE_BOOTSTRAP: 'store-bootstrap',
} as const

/**
 * Enqueued by store administration when a store is created.
 */
export interface StoreBootstrapJobData {
  storeId: number
}

let storeBootstrapQueue: Queue<StoreBootstrapJobData> | null = null

export function getStoreBootstrapQueue(): Queue<StoreBootstrapJobData> {
  if (!storeBootstrapQueue) {
    storeBootstrapQueue = new Queue<StoreBootstrapJobData>(QUEUE_NAMES.STORE_BOOTSTRAP, {
      connection: redisConnection,
    })
  }
  return storeBootstrapQueue
}

/**
 * Enqueue a bootstrap for a store. The job id is derived from the store so a
 * double submit while the first job is waiting or running is dropped by
 * BullMQ. A finished job under the same id is removed first so the store can
 * be bootstrapped again.
 */
export async function enqueueStoreBootstrap(storeId: number): Promise<string | undefined> {
  const queue = getStoreBootstrapQueue()
  const jobId = `store-bootstrap-${storeId}`

  const existing = await queue.getJob(jobId)
  if (existing) {
    const state = await existing.getState()
    if (state === 'completed' || state === 'failed') {
      await existing.remove()
    }
  }

  const job = await queue.add(
    'bootstrap',
    { storeId },
    {
      jobId,
      attempts: 3,
      backoff: { type: 'exponential', delay: 30000 },
      removeOnComplete: 100,
      removeOnFail: 500,
    }
  )
  return job.id
}

export async function closeQueues(): Promise<void> {
  if (storeBootstrapQueue) {
    await storeBootstrapQueue.close()
    storeBootstrapQueue = null
  }
}

import { beforeEach, describe, it, expect, vi } from 'vitest'

const mocks = vi.hoisted(() => {
  const add = vi.fn()
  const getJob = vi.fn()
  const close = vi.fn().mockResolvedValue(undefined)
  const created: string[] = []

  class QueueMock {
    add = add
    getJob = getJob
    close = close

    constructor(name: string) {
      created.push(name)
    }
  }

  return { add, getJob, close, created, QueueMock }
})

vi.mock('bullmq', () => ({
  Queue: mocks.QueueMock,
}))

import { closeQueues, enqueueStoreBootstrap, QUEUE_NAMES } from '../queues.js'

function existingJob(state: string) {
  return {
    getState: vi.fn().mockResolvedValue(state),
    remove: vi.fn().mockResolvedValue(undefined),
  }
}

describe('enqueueStoreBootstrap', () => {
  beforeEach(() => {
    mocks.add.mockReset().mockResolvedValue({ id: 'store-bootstrap-7' })
    mocks.getJob.mockReset().mockResolvedValue(undefined)
  })

  it('adds a job keyed by store id to the bootstrap queue', async () => {
    const id = await enqueueStoreBootstrap(7)

    expect(id).toBe('store-bootstrap-7')
    expect(mocks.created).toEqual([QUEUE_NAMES.STORE_BOOTSTRAP])
    expect(mocks.getJob).toHaveBeenCalledWith('store-bootstrap-7')
    expect(mocks.add).toHaveBeenCalledWith(
      'bootstrap',
      { storeId: 7 },
      expect.objectContaining({ jobId: 'store-bootstrap-7', attempts: 3 })
    )
  })

  it.each(['completed', 'failed'])('removes a %s job before adding it again', async state => {
    const job = existingJob(state)
    mocks.getJob.mockResolvedValue(job)

    await enqueueStoreBootstrap(7)

    expect(job.remove).toHaveBeenCalledTimes(1)
    expect(job.remove.mock.invocationCallOrder[0]).toBeLessThan(mocks.add.mock.invocationCallOrder[0])
    expect(mocks.add).toHaveBeenCalledTimes(1)
  })

  it.each(['waiting', 'active', 'delayed'])('leaves a %s job in place', async state => {
    const job = existingJob(state)
    mocks.getJob.mockResolvedValue(job)

    await enqueueStoreBootstrap(7)

    expect(job.remove).not.toHaveBeenCalled()
    expect(mocks.add).toHaveBeenCalledTimes(1)
  })

  it('reuses the queue and closes it once', async () => {
    await enqueueStoreBootstrap(8)
    expect(mocks.created).toHaveLength(1)

    await closeQueues()
    await closeQueues()
    expect(mocks.close).toHaveBeenCalledTimes(1)
  })
})

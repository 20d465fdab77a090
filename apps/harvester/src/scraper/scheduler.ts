/**
 * Sync Scheduler
 *
 * Ticks on an interval and starts a product sync when the SYNC_CRON slot has
 * passed since the last run. Only one sync runs at a time per process; a tick
 * that lands while a sync is still going is skipped.
 */

import CronParser from 'cron-parser'
import { silentLogger, type ILogger } from '@shopsweep/logger'
import type { SyncSummary } from './types.js'
import { ConfigError, errorMessage } from '../errors.js'

/** Fallback window when the cron expression cannot be parsed */
const FALLBACK_INTERVAL_MS = 6 * 60 * 60 * 1000

const DEFAULT_TICK_INTERVAL_MS = 60_000

/**
 * Check whether a sync is due under `cron`.
 *
 * Due when there has never been a run, or the last run started before the
 * most recent scheduled time (evaluated in UTC).
 */
export function isSyncDue(
  cron: string,
  lastRunAt: Date | null,
  now: Date = new Date(),
  log: ILogger = silentLogger
): boolean {
  if (!lastRunAt) return true

  try {
    const interval = CronParser.parse(cron, {
      currentDate: now,
      tz: 'UTC',
    })
    const prevScheduled = interval.prev().toDate()
    return lastRunAt < prevScheduled
  } catch (error) {
    log.warn('Invalid cron schedule, using fallback', { schedule: cron, error: errorMessage(error) })
    return lastRunAt.getTime() < now.getTime() - FALLBACK_INTERVAL_MS
  }
}

/**
 * Throw a ConfigError when `cron` is not a valid expression.
 */
export function assertValidCron(cron: string): void {
  try {
    CronParser.parse(cron, { tz: 'UTC' })
  } catch (error) {
    throw new ConfigError(`Invalid SYNC_CRON expression "${cron}": ${errorMessage(error)}`)
  }
}

export interface SyncSchedulerConfig {
  cron: string
  /** Starts one sync run; the signal aborts it on shutdown */
  runSync: (signal: AbortSignal) => Promise<SyncSummary>
  tickIntervalMs?: number
  logger?: ILogger
  now?: () => Date
}

export class SyncScheduler {
  private interval: NodeJS.Timeout | null = null
  private running: Promise<void> | null = null
  private lastRunAt: Date | null = null
  private readonly controller = new AbortController()
  private readonly log: ILogger
  private readonly now: () => Date

  constructor(private readonly config: SyncSchedulerConfig) {
    this.log = config.logger ?? silentLogger
    this.now = config.now ?? (() => new Date())
  }

  start(): void {
    if (this.interval) {
      this.log.warn('Scheduler already running')
      return
    }

    assertValidCron(this.config.cron)
    const tickIntervalMs = this.config.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS
    this.log.info('Starting sync scheduler', { cron: this.config.cron, tickIntervalMs })

    // Run immediately on start
    void this.tick()

    this.interval = setInterval(() => {
      void this.tick()
    }, tickIntervalMs)
  }

  /**
   * Stop ticking, abort the in-flight sync and wait for it to wind down.
   */
  async stop(): Promise<void> {
    if (this.interval) {
      this.log.info('Stopping sync scheduler')
      clearInterval(this.interval)
      this.interval = null
    }
    this.controller.abort()
    if (this.running) {
      await this.running
    }
  }

  isRunning(): boolean {
    return this.interval !== null
  }

  /**
   * Evaluate the schedule once. Resolves when any sync it started finishes.
   */
  async tick(): Promise<void> {
    if (this.running) {
      this.log.debug('Scheduler tick skipped - previous sync still running')
      return
    }

    const now = this.now()
    if (!isSyncDue(this.config.cron, this.lastRunAt, now, this.log)) {
      return
    }

    this.lastRunAt = now
    this.running = this.runOnce()
    try {
      await this.running
    } finally {
      this.running = null
    }
  }

  private async runOnce(): Promise<void> {
    try {
      const summary = await this.config.runSync(this.controller.signal)
      this.log.info('Scheduled sync finished', {
        runId: summary.runId,
        succeeded: summary.succeeded,
        failed: summary.failed,
        totalProducts: summary.totalProducts,
      })
    } catch (error) {
      this.log.error('Scheduled sync failed', { error: errorMessage(error) }, error)
    }
  }
}

import Redis, { type RedisOptions } from 'ioredis'
import { loggers } from './logger.js'
import { errorMessage } from '../errors.js'

const log = loggers.redis

// Support REDIS_URL or individual HOST/PORT/PASSWORD (local dev)
const redisUrl = process.env.REDIS_URL
const redisHost = process.env.REDIS_HOST || 'localhost'
const redisPort = parseInt(process.env.REDIS_PORT || '6379', 10)
const redisPassword = process.env.REDIS_PASSWORD || undefined

// For logging purposes, mask the password when using URL mode
const redisLogInfo = redisUrl ? redisUrl.replace(/\/\/:[^@]+@/, '//***@') : `${redisHost}:${redisPort}`

// Circuit breaker state for reducing log spam during prolonged outages
let consecutiveFailures = 0
let lastCircuitBreakerLog = 0

const baseOptions: RedisOptions = {
  // Required by BullMQ workers
  maxRetriesPerRequest: null,
  keepAlive: 10000,
  connectTimeout: 10000,
  enableOfflineQueue: true,
  retryStrategy(times: number) {
    consecutiveFailures = times

    // After 20 attempts, log once per minute
    if (times > 20) {
      const now = Date.now()
      if (now - lastCircuitBreakerLog > 60000) {
        lastCircuitBreakerLog = now
        log.error('Redis circuit breaker: prolonged outage', {
          attempts: times,
          connection: redisLogInfo,
        })
      }
      return 30000
    }

    const delay = Math.min(times * 500, 30000)
    log.info('Reconnecting', { attempt: times, delayMs: delay })
    return delay
  },
  reconnectOnError(err: Error) {
    const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EHOSTUNREACH']
    if (targetErrors.some(e => err.message.includes(e))) {
      if (consecutiveFailures <= 20) {
        log.warn('Reconnecting due to error', { error: err.message })
      }
      return true
    }
    return false
  },
}

/**
 * Connection options for BullMQ. In URL mode the URL is parsed into
 * host/port/password so BullMQ can open its own connections.
 */
export const redisConnection: RedisOptions = redisUrl
  ? { ...baseOptions, ...optionsFromUrl(redisUrl) }
  : { ...baseOptions, host: redisHost, port: redisPort, password: redisPassword }

function optionsFromUrl(url: string): RedisOptions {
  const parsed = new URL(url)
  const db = parsed.pathname.replace('/', '')
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: db ? parseInt(db, 10) : undefined,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
  }
}

/**
 * Ping Redis with retries before starting workers.
 */
export async function warmupRedis(maxAttempts = 5): Promise<boolean> {
  const warmupOptions: RedisOptions = {
    ...redisConnection,
    maxRetriesPerRequest: 1,
    retryStrategy: () => null,
    connectTimeout: 5000,
  }

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const client = new Redis(warmupOptions)
    try {
      log.info('Connection attempt', { attempt, maxAttempts, connection: redisLogInfo })
      await client.ping()
      log.info('Connection established successfully')
      return true
    } catch (error) {
      log.error('Connection failed', { error: errorMessage(error) })

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        log.info('Retrying', { delayMs })
        await new Promise(resolve => setTimeout(resolve, delayMs))
      }
    } finally {
      client.disconnect()
    }
  }

  log.error('Failed to establish connection after all attempts', { maxAttempts })
  return false
}

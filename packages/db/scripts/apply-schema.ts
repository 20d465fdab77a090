#!/usr/bin/env tsx
/**
 * Apply schema.sql to DATABASE_URL.
 *
 * The schema only uses IF NOT EXISTS statements, so running this on every
 * deploy is safe.
 *
 * Exit codes:
 *   0 = schema applied
 *   1 = connection or statement failure
 */

import { readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import { createLogger } from '@shopsweep/logger'
import { createPool } from '../src/client.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

config({ path: resolve(__dirname, '..', '.env') })
config({ path: resolve(__dirname, '..', '..', '..', '.env') })

const SCHEMA_PATH = resolve(__dirname, '..', 'schema.sql')
const log = createLogger('db').child('schema')

async function main(): Promise<void> {
  const sql = readFileSync(SCHEMA_PATH, 'utf8')
  const pool = createPool()
  try {
    await pool.query(sql)
    log.info('Schema applied', { path: SCHEMA_PATH })
  } finally {
    await pool.end()
  }
}

main().catch((error: unknown) => {
  log.fatal('Schema apply failed', {}, error)
  process.exit(1)
})

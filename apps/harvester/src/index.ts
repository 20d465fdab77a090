/**
 * @shopsweep/harvester
 *
 * Storefront catalog harvester: scraper engine, settings and queue entry points.
 */

export * from './scraper/index.js'
export { loadSettings, getSettings, DEFAULT_SETTINGS } from './config/settings.js'
export type { HarvesterSettings } from './config/settings.js'
export { enqueueStoreBootstrap, QUEUE_NAMES } from './config/queues.js'
export type { StoreBootstrapJobData } from './config/queues.js'
export { HarvesterError, ConfigError, StoreNotFoundError, HARVESTER_ERROR_CODES } from './errors.js'

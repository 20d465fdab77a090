/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@shopsweep/logger'

// Root logger for the harvester service
export const logger = createLogger('harvester')

export const loggers = {
  tokens: logger.child('tokens'),
  categories: logger.child('categories'),
  products: logger.child('products'),
  sync: logger.child('sync'),
  bootstrap: logger.child('bootstrap'),
  scheduler: logger.child('scheduler'),
  cli: logger.child('cli'),
  db: logger.child('db'),
  redis: logger.child('redis'),
}

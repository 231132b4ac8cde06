/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for crawl components
 */

import { createLogger } from '@tilecrawl/logger'

// Root logger for the harvester service
export const logger = createLogger('harvester')

export const loggers = {
  crawler: logger.child('crawler'),
  search: logger.child('search'),
  detail: logger.child('detail'),
  state: logger.child('state'),
  fetch: logger.child('fetch'),
}

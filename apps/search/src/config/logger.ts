/**
 * Search Logger Configuration
 *
 * Pre-configured loggers for search components
 */

import { createLogger } from '@pricemesh/logger'

// Root logger for the search service
export const logger = createLogger('search')

export const loggers = {
  config: logger.child('config'),
  orchestrator: logger.child('orchestrator'),
  providers: logger.child('providers'),
  pricing: logger.child('pricing'),
  matching: logger.child('matching'),
  processing: logger.child('processing'),
}

/**
 * Mapper Logger Configuration
 *
 * Pre-configured loggers for mapper components
 */

import { createLogger } from '@brewmap/logger'

// Root logger for the mapper service
const rootLogger = createLogger('mapper')

export const logger = {
  resolver: rootLogger.child('resolver'),
  io: rootLogger.child('io'),
  catalog: rootLogger.child('catalog'),
  nutrition: rootLogger.child('nutrition'),
  pipeline: rootLogger.child('pipeline'),
  config: rootLogger.child('config'),
  cli: rootLogger.child('cli'),
}

export { rootLogger }

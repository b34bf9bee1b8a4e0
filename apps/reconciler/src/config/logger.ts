/**
 * Reconciler Logger Configuration
 *
 * Pre-configured loggers for reconciler components
 */

import { createLogger } from '@kibble/logger'

// Root logger for the reconciler service
export const logger = createLogger('reconciler')

export const loggers = {
  run: logger.child('run'),
  merge: logger.child('merge'),
  overrides: logger.child('overrides'),
  guards: logger.child('guards'),
  publish: logger.child('publish'),
  store: logger.child('store'),
  lease: logger.child('lease'),
  cli: logger.child('cli'),
}

/**
 * Poller loggers, one child per component.
 */

import { createLogger } from '@p2000-monitor/logger'

export const logger = createLogger('poller')

export const loggers = {
  worker: logger.child('worker'),
  config: logger.child('config'),
  fetcher: logger.child('fetcher'),
  parser: logger.child('parser'),
  coordinator: logger.child('coordinator'),
  metrics: logger.child('metrics'),
  cli: logger.child('cli'),
}

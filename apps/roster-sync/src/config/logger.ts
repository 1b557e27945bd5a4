import { createLogger } from '@codeplug/logger'

export const rootLogger = createLogger('roster-sync')

export const loggers = {
  source: rootLogger.child('source'),
  enrich: rootLogger.child('enrich'),
  store: rootLogger.child('store'),
  pipeline: rootLogger.child('pipeline'),
  cli: rootLogger.child('cli'),
}

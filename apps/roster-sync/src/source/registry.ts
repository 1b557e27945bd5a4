/**
 * Table source registry
 *
 * Maps the configured source mode to its implementation and to the
 * classification criteria that fit the labels that source renders.
 */

import type { ILogger } from '@codeplug/logger'
import { loggers } from '../config/logger.js'
import { criteriaFor, type Settings, type SourceSettings } from '../config/settings.js'
import type { ClassificationCriteria, SourceMode, TableSource } from '../types.js'
import { BackendCallsSource } from './backend/source.js'
import { CallWatchSource } from './callwatch/source.js'
import type { Fetcher } from './fetch/types.js'

export interface SourceDependencies {
  fetcher: Fetcher
  logger?: ILogger
}

type SourceFactory = (settings: SourceSettings, fetcher: Fetcher, logger: ILogger) => TableSource

const FACTORIES: Record<SourceMode, SourceFactory> = {
  callwatch: (settings, fetcher, logger) =>
    new CallWatchSource({
      url: settings.callwatchUrl,
      maxRows: settings.maxRows,
      timeoutMs: settings.fetchTimeoutMs,
      fetcher,
      logger,
    }),
  backend: (settings, fetcher, logger) =>
    new BackendCallsSource({
      baseUrl: settings.backendUrl,
      callsPath: settings.callsPath,
      pageSize: settings.pageSize,
      user: settings.user,
      password: settings.password,
      timeoutMs: settings.fetchTimeoutMs,
      fetcher,
      logger,
    }),
}

export function createTableSource(
  settings: Settings,
  deps: SourceDependencies
): { source: TableSource; criteria: ClassificationCriteria } {
  const mode = settings.source.mode
  const logger = (deps.logger ?? loggers.source).child(mode)

  return {
    source: FACTORIES[mode](settings.source, deps.fetcher, logger),
    criteria: criteriaFor(settings),
  }
}

/**
 * Backend call-record source
 *
 * Logs in, then walks every page of the call records in order. A page that
 * cannot be read after its retry, or that holds no usable rows, ends the
 * sequence; only the first page is required.
 */

import type { ILogger } from '@codeplug/logger'
import { FAULT_CODES, SourceUnreachableFault } from '../../errors.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import type { ObservedRow, TableSource } from '../../types.js'
import type { Fetcher } from '../fetch/types.js'
import { SINGLE_RETRY_POLICY } from '../fetch/types.js'
import { buildPageUrl, countPages, extractBackendRows } from './adapter.js'
import { login, type BackendSession } from './session.js'

export interface BackendSourceOptions {
  baseUrl: string
  callsPath: string
  pageSize: number
  user?: string
  password?: string
  timeoutMs: number
  fetcher: Fetcher
  logger: ILogger
}

export class BackendCallsSource implements TableSource {
  readonly id = 'backend'
  private readonly options: BackendSourceOptions

  constructor(options: BackendSourceOptions) {
    this.options = options
  }

  async *produce(): AsyncGenerator<ObservedRow> {
    const { baseUrl, user, password, timeoutMs, fetcher, logger } = this.options

    const session = await login({ baseUrl, user, password, timeoutMs, fetcher, logger })

    const firstUrl = this.pageUrl(1)
    const first = await this.fetchPage(firstUrl, session)
    if (first.body === undefined) {
      throw new SourceUnreachableFault(
        FAULT_CODES.SOURCE_UNREACHABLE,
        `Unable to access call records: ${first.error}`,
        { details: sanitizeUrl(firstUrl) }
      )
    }

    const firstHtml = first.body
    const totalPages = countPages(firstHtml)
    logger.info('Total pages available', { totalPages })

    for (let page = 1; page <= totalPages; page++) {
      let html = firstHtml
      if (page > 1) {
        const next = await this.fetchPage(this.pageUrl(page), session)
        if (next.body === undefined) {
          logger.warn('Could not navigate to page, stopping', { page, totalPages, error: next.error })
          return
        }
        html = next.body
      }

      const results = extractBackendRows(html)
      const rows: ObservedRow[] = []
      for (const result of results) {
        if (result.ok) {
          rows.push(result.row)
        } else {
          logger.debug('Row dropped', { page, reason: result.reason, details: result.details })
        }
      }

      if (rows.length === 0) {
        logger.info('No data on page, stopping', { page, totalPages })
        return
      }

      logger.info('Collected page records', { page, totalPages, rows: rows.length })
      yield* rows
    }
  }

  private pageUrl(page: number): string {
    return buildPageUrl(this.options.baseUrl, this.options.callsPath, page, this.options.pageSize)
  }

  private async fetchPage(
    url: string,
    session: BackendSession
  ): Promise<{ body?: string; error?: string }> {
    const result = await this.options.fetcher.fetch(url, {
      headers: { Cookie: session.cookie },
      timeoutMs: this.options.timeoutMs,
      retryPolicy: SINGLE_RETRY_POLICY,
    })

    if (result.status !== 'ok' || result.body === undefined) {
      return { error: result.error ?? result.status }
    }
    return { body: result.body }
  }
}

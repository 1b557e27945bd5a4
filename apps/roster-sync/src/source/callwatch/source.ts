/**
 * Public CallWatch source
 *
 * Reads the live call monitor (no login) in a single snapshot.
 */

import type { ILogger } from '@codeplug/logger'
import { FAULT_CODES, SourceUnreachableFault } from '../../errors.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import type { ObservedRow, TableSource } from '../../types.js'
import type { Fetcher } from '../fetch/types.js'
import { SINGLE_RETRY_POLICY } from '../fetch/types.js'
import { extractCallWatchRows, findBodyFrameUrl } from './adapter.js'

export interface CallWatchSourceOptions {
  url: string
  maxRows: number
  timeoutMs: number
  fetcher: Fetcher
  logger: ILogger
}

export class CallWatchSource implements TableSource {
  readonly id = 'callwatch'
  private readonly options: CallWatchSourceOptions

  constructor(options: CallWatchSourceOptions) {
    this.options = options
  }

  async *produce(): AsyncGenerator<ObservedRow> {
    const { url, maxRows, logger } = this.options

    const page = await this.fetchDocument(url)
    const frameUrl = findBodyFrameUrl(page.body, page.url)
    const html = frameUrl ? (await this.fetchDocument(frameUrl)).body : page.body

    const results = extractCallWatchRows(html, maxRows)
    let dropped = 0

    for (const result of results) {
      if (!result.ok) {
        dropped++
        logger.debug('Row dropped', { reason: result.reason, details: result.details })
        continue
      }
      yield result.row
    }

    logger.info('CallWatch snapshot read', {
      rows: results.length - dropped,
      dropped,
      viaFrame: frameUrl !== undefined,
    })
  }

  private async fetchDocument(url: string): Promise<{ body: string; url: string }> {
    const result = await this.options.fetcher.fetch(url, {
      timeoutMs: this.options.timeoutMs,
      retryPolicy: SINGLE_RETRY_POLICY,
    })

    if (result.status !== 'ok' || result.body === undefined) {
      throw new SourceUnreachableFault(
        FAULT_CODES.SOURCE_UNREACHABLE,
        `Unable to access ${url}: ${result.error ?? result.status}`,
        { details: { ...sanitizeUrl(url), status: result.status, statusCode: result.statusCode } }
      )
    }

    return { body: result.body, url: result.url ?? url }
  }
}

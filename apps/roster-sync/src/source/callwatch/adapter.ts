/**
 * CallWatch table extraction
 *
 * Turns the CallWatchBody document into observed rows. The radio id is the
 * last word of the alias column.
 */

import { firstAttr, loadHtml, tableBodyRows } from '../html.js'
import { toObservedRow, type RowParseResult } from '../rows.js'
import { COLUMNS, MIN_CELLS, SELECTORS } from './selectors.js'

/**
 * URL of the frame holding the call table, or undefined when the page is
 * already the table document.
 */
export function findBodyFrameUrl(html: string, pageUrl: string): string | undefined {
  const src = firstAttr(loadHtml(html), SELECTORS.bodyFrame, 'src')
  if (!src) return undefined
  try {
    return new URL(src, pageUrl).toString()
  } catch {
    return undefined
  }
}

/**
 * Parse at most `maxRows` table rows (header excluded).
 */
export function extractCallWatchRows(html: string, maxRows: number): RowParseResult[] {
  const $ = loadHtml(html)

  return tableBodyRows($, SELECTORS.table)
    .slice(0, maxRows)
    .map((cells): RowParseResult => {
      if (cells.length < MIN_CELLS) {
        return { ok: false, reason: 'MISSING_CELLS', details: `${cells.length} cells` }
      }
      return toObservedRow({
        idLabel: cells[COLUMNS.alias],
        group: cells[COLUMNS.group],
        network: cells[COLUMNS.network],
      })
    })
}

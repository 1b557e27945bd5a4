import { loadHtml, tableBodyRows } from '../html.js'
import { toObservedRow, type RowParseResult } from '../rows.js'
import { COLUMNS, MIN_CELLS, SELECTORS } from './selectors.js'

export function extractBackendRows(html: string): RowParseResult[] {
  return tableBodyRows(loadHtml(html), SELECTORS.table).map((cells): RowParseResult => {
    if (cells.length < MIN_CELLS) {
      return { ok: false, reason: 'MISSING_CELLS', details: `${cells.length} cells` }
    }
    return toObservedRow({
      idLabel: cells[COLUMNS.radioId],
      group: cells[COLUMNS.groupId],
      network: cells[COLUMNS.network],
    })
  })
}

/**
 * Page count from the page-number selector; 1 when the selector is absent.
 */
export function countPages(html: string): number {
  const options = loadHtml(html)(SELECTORS.pageNumberSelect).length
  return options > 0 ? options : 1
}

export function buildPageUrl(baseUrl: string, pathTemplate: string, page: number, size: number): string {
  const path = pathTemplate
    .replaceAll('{page}', String(page))
    .replaceAll('{size}', String(size))
  return new URL(path, baseUrl).toString()
}

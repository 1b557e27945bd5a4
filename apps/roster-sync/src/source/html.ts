import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Cell texts of every body row of the first table matching `selector`.
 * The first row is the header and is skipped.
 */
export function tableBodyRows($: cheerio.CheerioAPI, selector: string): string[][] {
  const rows: string[][] = []
  $(selector)
    .first()
    .find('tr')
    .slice(1)
    .each((_, row) => {
      rows.push(
        $(row)
          .find('td')
          .map((_, cell) => $(cell).text().trim())
          .get()
      )
    })
  return rows
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

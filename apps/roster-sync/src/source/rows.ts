import type { ObservedRow } from '../types.js'

export type RowParseResult =
  | { ok: true; row: ObservedRow }
  | { ok: false; reason: RowDropReason; details?: string }

export type RowDropReason =
  | 'MISSING_CELLS' // Row has fewer cells than the layout needs
  | 'MISSING_IDENTIFIER' // Identifier cell is empty
  | 'INVALID_IDENTIFIER' // Identifier token is not a number

const DIGITS = /^\d+$/

/**
 * Radio ID from a label. The identifier is the last whitespace-delimited
 * token, so "Jane Doe 3141592" and "3141592" both yield 3141592.
 */
export function parseRadioId(label: string): number | undefined {
  const tokens = label.trim().split(/\s+/)
  const last = tokens[tokens.length - 1]
  if (!last || !DIGITS.test(last)) {
    return undefined
  }
  const value = Number.parseInt(last, 10)
  return Number.isSafeInteger(value) ? value : undefined
}

export function toObservedRow(input: {
  idLabel: string
  group: string
  network: string
}): RowParseResult {
  if (!input.idLabel.trim()) {
    return { ok: false, reason: 'MISSING_IDENTIFIER' }
  }

  const identifier = parseRadioId(input.idLabel)
  if (identifier === undefined) {
    return { ok: false, reason: 'INVALID_IDENTIFIER', details: input.idLabel }
  }

  return {
    ok: true,
    row: {
      identifier,
      group: input.group.trim(),
      network: input.network.trim(),
    },
  }
}

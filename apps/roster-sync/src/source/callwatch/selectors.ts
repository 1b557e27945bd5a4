/**
 * CallWatch page layout
 *
 * The live monitor is a frameset; the call table lives in the
 * CallWatchBody frame. Column indexes are 0-based.
 */
export const SELECTORS = {
  bodyFrame: 'frame[name="CallWatchBody"], iframe[name="CallWatchBody"]',
  table: 'table',
} as const

export const COLUMNS = {
  alias: 3, // "<name> <radio id>"
  group: 4, // Talk-group name, e.g. "MWave"
  network: 6, // e.g. "AZ-TRBONET"
} as const

export const MIN_CELLS = COLUMNS.network + 1

import { vi } from 'vitest'
import type { ILogger } from '@codeplug/logger'
import type { FetchOptions, FetchResult, Fetcher } from '../source/fetch/types.js'
import type { PersistOptions, RosterStore } from '../roster/store.js'
import type {
  IdentityLookup,
  IdentityRecord,
  LookupEntry,
  ObservedRow,
  RosterState,
  SourceMode,
  TableSource,
} from '../types.js'

export function createTestLogger(): ILogger {
  const logger: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
  }
  return logger
}

export const record = (
  identifier: number,
  callsign: string,
  firstName = 'Test',
  state = 'Arizona'
): IdentityRecord => ({ identifier, callsign, firstName, state })

export const entry = (id: number, callsign: string, fname = 'Test', state = 'Arizona'): LookupEntry => ({
  id,
  callsign,
  fname,
  state,
})

export const row = (identifier: number, group: string, network: string): ObservedRow => ({
  identifier,
  group,
  network,
})

/**
 * Lookup stand-in backed by two tables. An id or callsign mapped to an
 * Error makes that call reject.
 */
export class FakeLookup implements IdentityLookup {
  readonly byId = new Map<number, LookupEntry[] | Error>()
  readonly byCallsign = new Map<string, LookupEntry[] | Error>()
  readonly calls: string[] = []

  async lookupById(identifier: number): Promise<LookupEntry[]> {
    this.calls.push(`id:${identifier}`)
    return this.answer(this.byId.get(identifier))
  }

  async lookupByCallsign(callsign: string): Promise<LookupEntry[]> {
    this.calls.push(`callsign:${callsign}`)
    return this.answer(this.byCallsign.get(callsign))
  }

  /** Register an operator: every id resolves to the callsign, which lists every id */
  operator(callsign: string, ...entries: LookupEntry[]): this {
    for (const item of entries) {
      this.byId.set(item.id, [item])
    }
    this.byCallsign.set(callsign, entries)
    return this
  }

  private answer(value: LookupEntry[] | Error | undefined): LookupEntry[] {
    if (value instanceof Error) throw value
    return value ?? []
  }
}

export function arraySource(rows: ObservedRow[], id: SourceMode = 'callwatch'): TableSource {
  return {
    id,
    async *produce() {
      yield* rows
    },
  }
}

export function okResult(body: string, extra: Partial<FetchResult> = {}): FetchResult {
  return { status: 'ok', statusCode: 200, body, durationMs: 1, ...extra }
}

export function failedResult(status: FetchResult['status'], statusCode?: number): FetchResult {
  return { status, statusCode, error: `HTTP ${statusCode ?? 0}`, durationMs: 1 }
}

/**
 * Fetcher stand-in answering from per-URL queues. The last answer for a
 * URL repeats; unknown URLs answer 404.
 */
export class FakeFetcher implements Fetcher {
  readonly calls: Array<{ url: string; options: FetchOptions }> = []
  private readonly routes = new Map<string, FetchResult[]>()

  on(url: string, ...results: FetchResult[]): this {
    this.routes.set(url, results)
    return this
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    this.calls.push({ url, options })
    const queue = this.routes.get(url)
    if (!queue || queue.length === 0) {
      return failedResult('error', 404)
    }
    const [next] = queue
    if (queue.length > 1) queue.shift()
    return next
  }
}

export async function collect(source: TableSource): Promise<ObservedRow[]> {
  const rows: ObservedRow[] = []
  for await (const item of source.produce()) {
    rows.push(item)
  }
  return rows
}

const cellsHtml = (cells: string[]): string => `<tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`

/** CallWatch body document: time, slot, site, alias, group, type, network */
export function callWatchPage(rows: string[][]): string {
  const header = '<tr><th>Time</th><th>Slot</th><th>Site</th><th>Alias</th><th>Group</th><th>Type</th><th>Network</th></tr>'
  return `<html><body><table>${header}${rows.map(cellsHtml).join('')}</table></body></html>`
}

export const callWatchRow = (alias: string, group: string, network: string): string[] => [
  '12:00:01',
  '1',
  'Phoenix',
  alias,
  group,
  'Voice',
  network,
]

/** Backend call-record page; radio id at 6, group id at 9, network at 11 */
export function backendPage(rows: string[][], pages = 1): string {
  const options = Array.from({ length: pages }, (_, i) => `<option value="${i + 1}">${i + 1}</option>`).join('')
  const select = pages > 0 ? `<select name="selectpagenumber">${options}</select>` : ''
  const header = `<tr>${Array.from({ length: 12 }, (_, i) => `<th>C${i}</th>`).join('')}</tr>`
  return `<html><body>${select}<table>${header}${rows.map(cellsHtml).join('')}</table></body></html>`
}

export const backendRow = (radioId: string, groupId: string, network: string): string[] => [
  '2024-05-01',
  '12:00:01',
  'Voice',
  '1',
  'Phoenix',
  'Private',
  radioId,
  '0',
  '1',
  groupId,
  'Group',
  network,
]

/**
 * In-memory roster store recording every persist call.
 */
export class MemoryRosterStore implements RosterStore {
  state: RosterState
  readonly persisted: Array<{ state: RosterState; options: PersistOptions }> = []
  loads = 0

  constructor(state: Partial<RosterState> = {}) {
    this.state = { main: [], audit: [], group: [], ...state }
  }

  async load(): Promise<RosterState> {
    this.loads++
    return this.state
  }

  async persist(state: RosterState, options: PersistOptions): Promise<void> {
    this.persisted.push({ state, options })
    this.state = state
  }
}

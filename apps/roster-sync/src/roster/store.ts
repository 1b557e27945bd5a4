/**
 * Roster State Store
 *
 * Owns the three CSV collections:
 * - main roster (code plug), identifier unique
 * - audit trail of additions, append-only
 * - group roster, identifier unique
 *
 * Invariants:
 * - load() is all-or-nothing: any unreadable or malformed file is a LoadFault
 * - merges never mutate their inputs
 * - persist() stages every file before renaming any of them, so a failed
 *   write leaves all stores as they were
 */

import { randomUUID } from 'node:crypto'
import { readFile, rename, unlink, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import type { ILogger } from '@codeplug/logger'
import { loggers } from '../config/logger.js'
import type { StoreSettings } from '../config/settings.js'
import { FAULT_CODES, LoadFault, PersistFault, errorMessage } from '../errors.js'
import type { AuditTrail, GroupRoster, IdentityRecord, MainRoster, RosterState } from '../types.js'

export const ROSTER_COLUMNS = ['RADIO_ID', 'CALLSIGN', 'FIRST_NAME', 'STATE'] as const

const csvRowsSchema = z.array(z.array(z.string()))
const RADIO_ID = /^\d+$/

// ═══════════════════════════════════════════════════════════════════════════════
// Merges
// ═══════════════════════════════════════════════════════════════════════════════

export interface MergeNewResult {
  main: MainRoster
  audit: AuditTrail
  /** False when there was nothing to add; main and audit are the inputs */
  changed: boolean
}

/**
 * Keep the first record of each identifier.
 */
export function dedupeByIdentifier(records: IdentityRecord[]): IdentityRecord[] {
  const seen = new Set<number>()
  return records.filter((record) => {
    if (seen.has(record.identifier)) return false
    seen.add(record.identifier)
    return true
  })
}

export function mergeNew(
  main: MainRoster,
  audit: AuditTrail,
  newRecords: IdentityRecord[]
): MergeNewResult {
  if (newRecords.length === 0) {
    return { main, audit, changed: false }
  }

  return {
    main: dedupeByIdentifier([...main, ...newRecords]),
    audit: [...audit, ...newRecords],
    changed: true,
  }
}

export function mergeGroup(group: GroupRoster, newRecords: IdentityRecord[]): GroupRoster {
  const present = new Set(group.map((record) => record.identifier))
  const merged = [...group]
  for (const record of newRecords) {
    if (present.has(record.identifier)) continue
    present.add(record.identifier)
    merged.push(record)
  }
  return merged
}

// ═══════════════════════════════════════════════════════════════════════════════
// CSV codec
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse one roster file. Throws a LoadFault naming the file on any problem.
 */
export function parseRosterCsv(content: string, file: string): IdentityRecord[] {
  let raw: unknown
  try {
    raw = parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true })
  } catch (error) {
    throw new LoadFault(FAULT_CODES.ROSTER_MALFORMED, `Unable to parse ${file}: ${errorMessage(error)}`, {
      cause: error,
      details: { file },
    })
  }

  const rows = csvRowsSchema.safeParse(raw)
  if (!rows.success || rows.data.length === 0) {
    throw new LoadFault(FAULT_CODES.ROSTER_MALFORMED, `${file} has no header row`, { details: { file } })
  }

  const [header, ...body] = rows.data
  const index = ROSTER_COLUMNS.map((column) => header.findIndex((cell) => cell.trim() === column))
  const missing = ROSTER_COLUMNS.filter((_, i) => index[i] === -1)
  if (missing.length > 0) {
    throw new LoadFault(FAULT_CODES.ROSTER_MALFORMED, `${file} is missing columns: ${missing.join(', ')}`, {
      details: { file, missing },
    })
  }

  const [idCol, callsignCol, nameCol, stateCol] = index
  return body.map((cells, i) => {
    const rawId = (cells[idCol] ?? '').trim()
    if (!RADIO_ID.test(rawId)) {
      throw new LoadFault(
        FAULT_CODES.ROSTER_MALFORMED,
        `${file} line ${i + 2}: RADIO_ID "${rawId}" is not an integer`,
        { details: { file, line: i + 2 } }
      )
    }
    return {
      identifier: Number.parseInt(rawId, 10),
      callsign: (cells[callsignCol] ?? '').trim(),
      firstName: (cells[nameCol] ?? '').trim(),
      state: (cells[stateCol] ?? '').trim(),
    }
  })
}

export function formatRosterCsv(records: IdentityRecord[]): string {
  return stringify([
    [...ROSTER_COLUMNS],
    ...records.map((record) => [
      String(record.identifier),
      record.callsign,
      record.firstName,
      record.state,
    ]),
  ])
}

// ═══════════════════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════════════════

export interface PersistOptions {
  /** Write main roster and audit trail; false when the merge added nothing */
  main: boolean
}

/**
 * What a sync cycle needs from persistence.
 */
export interface RosterStore {
  load(): Promise<RosterState>
  persist(state: RosterState, options: PersistOptions): Promise<void>
}

interface StagedFile {
  target: string
  temp: string
}

export class CsvRosterStore implements RosterStore {
  private readonly paths: StoreSettings
  private readonly logger: ILogger

  constructor(paths: StoreSettings, logger: ILogger = loggers.store) {
    this.paths = paths
    this.logger = logger
  }

  async load(): Promise<RosterState> {
    const [main, audit, group] = await Promise.all([
      this.loadFile(this.paths.mainPath),
      this.loadFile(this.paths.auditPath),
      this.loadFile(this.paths.groupPath),
    ])

    this.logger.info('Rosters loaded', {
      main: main.length,
      audit: audit.length,
      group: group.length,
    })
    return { main, audit, group }
  }

  /**
   * Write the group roster, and the main roster and audit trail when
   * `options.main` is set. Rows are written in array order.
   */
  async persist(state: RosterState, options: PersistOptions): Promise<void> {
    const writes: Array<[string, IdentityRecord[]]> = [[this.paths.groupPath, state.group]]
    if (options.main) {
      writes.push([this.paths.mainPath, state.main], [this.paths.auditPath, state.audit])
    }

    const staged: StagedFile[] = []
    try {
      for (const [target, records] of writes) {
        staged.push(await this.stage(target, formatRosterCsv(records)))
      }
    } catch (error) {
      await this.discard(staged)
      this.logger.warn('Staging roster files failed, nothing written', { files: writes.length }, error)
      throw new PersistFault(FAULT_CODES.ROSTER_WRITE_FAILED, `Unable to write rosters: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    const committed: string[] = []
    for (const file of staged) {
      try {
        await rename(file.temp, file.target)
        committed.push(basename(file.target))
      } catch (error) {
        await this.discard(staged.filter((other) => !committed.includes(basename(other.target))))
        this.logger.warn('Roster commit interrupted, stores may disagree', { committed }, error)
        throw new PersistFault(
          FAULT_CODES.ROSTER_WRITE_FAILED,
          `Unable to replace ${file.target}: ${errorMessage(error)}`,
          { cause: error, details: { committed } }
        )
      }
    }

    this.logger.info('Rosters persisted', {
      files: committed,
      main: state.main.length,
      audit: state.audit.length,
      group: state.group.length,
    })
  }

  private async loadFile(path: string): Promise<IdentityRecord[]> {
    let content: string
    try {
      content = await readFile(path, 'utf8')
    } catch (error) {
      throw new LoadFault(FAULT_CODES.ROSTER_UNREADABLE, `Unable to access ${path}: ${errorMessage(error)}`, {
        cause: error,
        details: { file: basename(path) },
      })
    }
    return parseRosterCsv(content, basename(path))
  }

  private async stage(target: string, content: string): Promise<StagedFile> {
    const temp = join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`)
    await writeFile(temp, content, 'utf8')
    return { target, temp }
  }

  private async discard(files: StagedFile[]): Promise<void> {
    await Promise.all(
      files.map((file) =>
        unlink(file.temp).catch((error: unknown) => {
          this.logger.debug('Temp file already gone', { temp: basename(file.temp), reason: errorMessage(error) })
        })
      )
    )
  }
}

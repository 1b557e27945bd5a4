/**
 * Enricher
 *
 * Resolves radio ids to identity records in two stages:
 * 1. id -> callsign (first result of the id lookup)
 * 2. callsign -> every radio id registered to it
 *
 * One operator often holds several ids (mobile, handheld), so stage 2
 * brings in the whole cluster. A failed lookup only costs its own id.
 */

import type { ILogger } from '@codeplug/logger'
import { loggers } from '../config/logger.js'
import { PipelineFault, errorMessage } from '../errors.js'
import type { GroupRoster, IdentityLookup, IdentityRecord, LookupEntry } from '../types.js'

export interface EnrichResult {
  records: IdentityRecord[]
  /** Ids whose resolution failed or found nothing */
  unresolvedIds: number[]
}

export function toIdentityRecord(entry: LookupEntry): IdentityRecord {
  return {
    identifier: entry.id,
    callsign: entry.callsign,
    firstName: entry.fname,
    state: entry.state,
  }
}

export function recordKey(record: IdentityRecord): string {
  return JSON.stringify([record.identifier, record.callsign, record.firstName, record.state])
}

/**
 * Drop records equal in every field to an earlier one.
 */
export function dedupeRecords(records: IdentityRecord[]): IdentityRecord[] {
  const seen = new Set<string>()
  return records.filter((record) => {
    const key = recordKey(record)
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}

export class Enricher {
  private readonly lookup: IdentityLookup
  private readonly logger: ILogger

  constructor(lookup: IdentityLookup, logger: ILogger = loggers.enrich) {
    this.lookup = lookup
    this.logger = logger
  }

  /**
   * Candidate records for every id, deduplicated by full-record equality.
   */
  async enrich(ids: Iterable<number>): Promise<EnrichResult> {
    const candidates: IdentityRecord[] = []
    const unresolvedIds: number[] = []

    for (const id of ids) {
      const resolved = await this.resolve(id)
      if (resolved === null) {
        unresolvedIds.push(id)
        continue
      }
      candidates.push(...resolved)
    }

    return { records: dedupeRecords(candidates), unresolvedIds }
  }

  /**
   * Candidate records whose identifier is not yet in the group roster.
   * The first candidate for an identifier wins within one call.
   */
  async enrichForGroup(ids: Iterable<number>, groupRoster: GroupRoster): Promise<EnrichResult> {
    const present = new Set(groupRoster.map((record) => record.identifier))
    const records: IdentityRecord[] = []
    const unresolvedIds: number[] = []

    for (const id of ids) {
      const resolved = await this.resolve(id)
      if (resolved === null) {
        unresolvedIds.push(id)
        continue
      }
      for (const record of resolved) {
        if (present.has(record.identifier)) continue
        present.add(record.identifier)
        records.push(record)
      }
    }

    return { records, unresolvedIds }
  }

  /**
   * All records sharing the callsign of `id`, or null when either stage fails
   * or the id is unknown to the lookup service.
   */
  async resolve(id: number): Promise<IdentityRecord[] | null> {
    try {
      const [first] = await this.lookup.lookupById(id)
      if (!first) {
        this.logger.debug('No lookup result for id', { identifier: id })
        return null
      }

      const entries = await this.lookup.lookupByCallsign(first.callsign)
      this.logger.debug('Resolved callsign', {
        identifier: id,
        callsign: first.callsign,
        ids: entries.length,
      })
      return entries.map(toIdentityRecord)
    } catch (error) {
      this.logger.warn(
        'Lookup failed, skipping id',
        {
          identifier: id,
          code: error instanceof PipelineFault ? error.code : undefined,
          reason: errorMessage(error),
        },
        error
      )
      return null
    }
  }
}

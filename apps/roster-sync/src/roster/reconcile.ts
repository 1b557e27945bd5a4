/**
 * Reconciler
 *
 * Sorts observed rows into two identifier sets:
 * - newIds: identifiers absent from the main roster that belong to the
 *   group of interest or the network of interest
 * - groupIds: every identifier seen in the group of interest, known or not
 *
 * The two checks are independent, so a single row may feed both sets.
 * The roster is only read.
 */

import type { ClassificationCriteria, MainRoster, ObservedRow } from '../types.js'

export interface ReconcileResult {
  newIds: Set<number>
  groupIds: Set<number>
}

export function matchesGroup(group: string, criteria: ClassificationCriteria): boolean {
  return criteria.groupTokens.some((token) =>
    criteria.groupMatch === 'exact' ? group === token : group.includes(token)
  )
}

export function rosterIdentifiers(roster: MainRoster): Set<number> {
  return new Set(roster.map((record) => record.identifier))
}

export function reconcile(
  rows: Iterable<ObservedRow>,
  roster: MainRoster,
  criteria: ClassificationCriteria
): ReconcileResult {
  const known = rosterIdentifiers(roster)
  const newIds = new Set<number>()
  const groupIds = new Set<number>()

  for (const row of rows) {
    if (matchesGroup(row.group, criteria)) {
      groupIds.add(row.identifier)
      if (!known.has(row.identifier)) {
        newIds.add(row.identifier)
      }
    }

    if (row.network === criteria.networkToken && !known.has(row.identifier)) {
      newIds.add(row.identifier)
    }
  }

  return { newIds, groupIds }
}

/**
 * Ascending identifiers, for a deterministic processing order.
 */
export function sortIds(ids: Iterable<number>): number[] {
  return [...ids].sort((a, b) => a - b)
}

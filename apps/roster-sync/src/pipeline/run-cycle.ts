/**
 * Sync Cycle
 *
 * One pass from the directory to the roster files:
 * 1. Collect every observed row from the table source
 * 2. Load the three rosters
 * 3. Reconcile rows against the main roster
 * 4. Enrich new ids and group ids through the identity lookup
 * 5. Merge and persist
 *
 * Fatal faults from steps 1-2 surface before anything is written.
 */

import { randomUUID } from 'node:crypto'
import type { ILogger } from '@codeplug/logger'
import { loggers } from '../config/logger.js'
import { createWorkflowLogger, type WorkflowLogger } from '../config/structured-log.js'
import { FAULT_CODES, SourceUnreachableFault } from '../errors.js'
import type { Enricher } from '../roster/enrich.js'
import { reconcile, sortIds } from '../roster/reconcile.js'
import { mergeGroup, mergeNew, type RosterStore } from '../roster/store.js'
import type { ClassificationCriteria, ObservedRow, TableSource } from '../types.js'

export interface CycleDependencies {
  source: TableSource
  criteria: ClassificationCriteria
  store: RosterStore
  enricher: Enricher
  logger?: ILogger
  /** Run every stage but skip persistence */
  dryRun?: boolean
  runId?: string
}

export interface CycleSummary {
  runId: string
  rowsExamined: number
  newIds: number[]
  groupIds: number[]
  /** Records merged into the main roster and audit trail */
  newRecords: number
  /** Records appended to the group roster */
  groupAdded: number
  unresolvedIds: number[]
  persisted: boolean
  durationMs: number
}

export async function collectRows(source: TableSource, log: WorkflowLogger): Promise<ObservedRow[]> {
  const rows: ObservedRow[] = []
  for await (const row of source.produce()) {
    rows.push(row)
  }

  if (rows.length === 0) {
    throw new SourceUnreachableFault(FAULT_CODES.NO_ROWS_OBSERVED, 'No data was collected')
  }

  log.info('Total records collected', { rows: rows.length })
  return rows
}

export async function runCycle(deps: CycleDependencies): Promise<CycleSummary> {
  const startTime = Date.now()
  const runId = deps.runId ?? randomUUID()
  const log = createWorkflowLogger(deps.logger ?? loggers.pipeline, {
    workflow: 'roster-sync',
    stage: 'collect',
    runId,
    source: deps.source.id,
  })

  const rows = await collectRows(deps.source, log)

  const state = await deps.store.load()

  const { newIds, groupIds } = reconcile(rows, state.main, deps.criteria)
  const orderedNewIds = sortIds(newIds)
  const orderedGroupIds = sortIds(groupIds)
  log.child({ stage: 'reconcile' }).info('Rows reconciled', {
    newIds: orderedNewIds.length,
    groupIds: orderedGroupIds.length,
  })

  const enrichLog = log.child({ stage: 'enrich' })
  const enriched = await deps.enricher.enrich(orderedNewIds)
  enrichLog.info('New ids enriched', {
    records: enriched.records.length,
    unresolved: enriched.unresolvedIds.length,
  })

  const groupEnriched = await deps.enricher.enrichForGroup(orderedGroupIds, state.group)
  enrichLog.info('Group ids enriched', {
    records: groupEnriched.records.length,
    unresolved: groupEnriched.unresolvedIds.length,
  })

  const merged = mergeNew(state.main, state.audit, enriched.records)
  const group = mergeGroup(state.group, groupEnriched.records)

  const persistLog = log.child({ stage: 'persist' })
  if (deps.dryRun) {
    persistLog.info('Dry run, rosters left untouched', { mainChanged: merged.changed })
  } else {
    await deps.store.persist({ main: merged.main, audit: merged.audit, group }, { main: merged.changed })
  }

  const summary: CycleSummary = {
    runId,
    rowsExamined: rows.length,
    newIds: orderedNewIds,
    groupIds: orderedGroupIds,
    newRecords: enriched.records.length,
    groupAdded: group.length - state.group.length,
    unresolvedIds: sortIds(new Set([...enriched.unresolvedIds, ...groupEnriched.unresolvedIds])),
    persisted: !deps.dryRun,
    durationMs: Date.now() - startTime,
  }

  persistLog.info('Cycle complete', {
    rowsExamined: summary.rowsExamined,
    newRecords: summary.newRecords,
    groupAdded: summary.groupAdded,
    durationMs: summary.durationMs,
  })
  return summary
}

import { describe, it, expect } from 'vitest'
import { runCycle, type CycleDependencies } from '../run-cycle.js'
import { Enricher } from '../../roster/enrich.js'
import { FAULT_CODES, LoadFault } from '../../errors.js'
import type { ClassificationCriteria, ObservedRow, RosterState, TableSource } from '../../types.js'
import {
  FakeLookup,
  MemoryRosterStore,
  arraySource,
  createTestLogger,
  entry,
  record,
  row,
} from '../../__tests__/helpers.js'

const criteria: ClassificationCriteria = {
  groupTokens: ['MWave'],
  groupMatch: 'substring',
  networkToken: 'AZ-TRBONET',
}

function createDeps(
  rows: ObservedRow[] | TableSource,
  store: MemoryRosterStore,
  lookup: FakeLookup,
  extra: Partial<CycleDependencies> = {}
): CycleDependencies {
  const logger = createTestLogger()
  return {
    source: Array.isArray(rows) ? arraySource(rows) : rows,
    criteria,
    store,
    enricher: new Enricher(lookup, logger),
    logger,
    runId: 'run-1',
    ...extra,
  }
}

describe('runCycle', () => {
  it('merges a newly seen group member into all three rosters', async () => {
    const store = new MemoryRosterStore({ main: [record(1, 'AA1AA')] })
    const lookup = new FakeLookup().operator('BB2BB', entry(2, 'BB2BB'), entry(3, 'BB2BB'))
    lookup.operator('AA1AA', entry(1, 'AA1AA'))

    const summary = await runCycle(
      createDeps([row(1, 'Other', 'AZ-TRBONET'), row(2, 'MWave', 'Other')], store, lookup)
    )

    const expected: RosterState = {
      main: [record(1, 'AA1AA'), record(2, 'BB2BB'), record(3, 'BB2BB')],
      audit: [record(2, 'BB2BB'), record(3, 'BB2BB')],
      group: [record(2, 'BB2BB'), record(3, 'BB2BB')],
    }
    expect(store.persisted).toEqual([{ state: expected, options: { main: true } }])
    expect(summary).toMatchObject({
      runId: 'run-1',
      rowsExamined: 2,
      newIds: [2],
      groupIds: [2],
      newRecords: 2,
      groupAdded: 2,
      unresolvedIds: [],
      persisted: true,
    })
  })

  it('writes only the group roster when nothing is new', async () => {
    const main = [record(1, 'AA1AA')]
    const store = new MemoryRosterStore({ main, audit: [record(1, 'AA1AA')], group: [record(1, 'AA1AA')] })
    const lookup = new FakeLookup().operator('AA1AA', entry(1, 'AA1AA'))

    const summary = await runCycle(createDeps([row(1, 'MWave', 'AZ-TRBONET')], store, lookup))

    expect(store.persisted).toHaveLength(1)
    expect(store.persisted[0].options).toEqual({ main: false })
    expect(store.persisted[0].state.main).toBe(main)
    expect(summary.newRecords).toBe(0)
    expect(summary.groupAdded).toBe(0)
  })

  it('processes new ids in ascending order', async () => {
    const store = new MemoryRosterStore()
    const lookup = new FakeLookup()
      .operator('C30', entry(30, 'C30'))
      .operator('C10', entry(10, 'C10'))
      .operator('C20', entry(20, 'C20'))

    const summary = await runCycle(
      createDeps([row(30, 'x', 'AZ-TRBONET'), row(10, 'x', 'AZ-TRBONET'), row(20, 'x', 'AZ-TRBONET')], store, lookup)
    )

    expect(summary.newIds).toEqual([10, 20, 30])
    expect(store.state.main.map((r) => r.identifier)).toEqual([10, 20, 30])
  })

  it('reports ids the lookup could not resolve', async () => {
    const store = new MemoryRosterStore()
    const lookup = new FakeLookup().operator('OK20', entry(20, 'OK20'))
    lookup.byId.set(10, new Error('socket hang up'))

    const summary = await runCycle(
      createDeps([row(10, 'MWave', 'AZ-TRBONET'), row(20, 'MWave', 'AZ-TRBONET')], store, lookup)
    )

    expect(summary.unresolvedIds).toEqual([10])
    expect(store.state.main).toEqual([record(20, 'OK20')])
    expect(store.state.group).toEqual([record(20, 'OK20')])
  })

  it('fails before loading when the source yields no rows', async () => {
    const store = new MemoryRosterStore()

    await expect(runCycle(createDeps([], store, new FakeLookup()))).rejects.toMatchObject({
      code: FAULT_CODES.NO_ROWS_OBSERVED,
      message: 'No data was collected',
    })
    expect(store.loads).toBe(0)
    expect(store.persisted).toEqual([])
  })

  it('persists nothing when loading fails', async () => {
    const store = new MemoryRosterStore()
    store.load = async () => {
      throw new LoadFault(FAULT_CODES.ROSTER_UNREADABLE, 'Unable to access code_plug.csv')
    }
    const lookup = new FakeLookup()

    await expect(runCycle(createDeps([row(1, 'MWave', 'AZ-TRBONET')], store, lookup))).rejects.toBeInstanceOf(
      LoadFault
    )
    expect(store.persisted).toEqual([])
    expect(lookup.calls).toEqual([])
  })

  it('runs every stage but persists nothing on a dry run', async () => {
    const store = new MemoryRosterStore()
    const lookup = new FakeLookup().operator('K5', entry(5, 'K5'))

    const summary = await runCycle(createDeps([row(5, 'MWave', 'AZ-TRBONET')], store, lookup, { dryRun: true }))

    expect(summary).toMatchObject({ newRecords: 1, groupAdded: 1, persisted: false })
    expect(store.persisted).toEqual([])
  })

  it('propagates a source fault raised mid-stream', async () => {
    const source: TableSource = {
      id: 'backend',
      async *produce() {
        yield row(1, 'MWave', 'AZ-TRBONET')
        throw new Error('connection reset')
      },
    }

    await expect(runCycle(createDeps(source, new MemoryRosterStore(), new FakeLookup()))).rejects.toThrowError(
      'connection reset'
    )
  })
})

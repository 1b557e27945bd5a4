import { describe, it, expect } from 'vitest'
import { extractCallWatchRows, findBodyFrameUrl } from '../adapter.js'
import { callWatchPage, callWatchRow } from '../../../__tests__/helpers.js'

describe('extractCallWatchRows', () => {
  it('reads identifier, group and network from each body row', () => {
    const html = callWatchPage([
      callWatchRow('Jane Doe 3141592', 'MWave', 'AZ-TRBONET'),
      callWatchRow('3100001', 'Statewide', 'Other'),
    ])

    expect(extractCallWatchRows(html, 200)).toEqual([
      { ok: true, row: { identifier: 3141592, group: 'MWave', network: 'AZ-TRBONET' } },
      { ok: true, row: { identifier: 3100001, group: 'Statewide', network: 'Other' } },
    ])
  })

  it('stops after maxRows rows', () => {
    const html = callWatchPage([
      callWatchRow('1', 'MWave', 'AZ-TRBONET'),
      callWatchRow('2', 'MWave', 'AZ-TRBONET'),
      callWatchRow('3', 'MWave', 'AZ-TRBONET'),
    ])

    expect(extractCallWatchRows(html, 2)).toHaveLength(2)
  })

  it('drops short rows and rows without an identifier', () => {
    const html = callWatchPage([['12:00:01', 'Phoenix'], callWatchRow('No Id', 'MWave', 'AZ-TRBONET')])

    expect(extractCallWatchRows(html, 200)).toEqual([
      { ok: false, reason: 'MISSING_CELLS', details: '2 cells' },
      { ok: false, reason: 'INVALID_IDENTIFIER', details: 'No Id' },
    ])
  })

  it('returns nothing for a page without a table', () => {
    expect(extractCallWatchRows('<html><body><p>Offline</p></body></html>', 200)).toEqual([])
  })
})

describe('findBodyFrameUrl', () => {
  it('resolves the body frame against the page URL', () => {
    const html =
      '<html><frameset rows="40,*"><frame name="CallWatchHeader" src="Header.aspx"><frame name="CallWatchBody" src="Body.aspx"></frameset></html>'

    expect(findBodyFrameUrl(html, 'http://monitor.test/CallWatch')).toBe('http://monitor.test/Body.aspx')
  })

  it('finds an inline frame', () => {
    const html = '<html><body><iframe name="CallWatchBody" src="/CallWatch/Body"></iframe></body></html>'

    expect(findBodyFrameUrl(html, 'http://monitor.test/CallWatch')).toBe('http://monitor.test/CallWatch/Body')
  })

  it('returns undefined when the page is the table itself', () => {
    expect(findBodyFrameUrl(callWatchPage([]), 'http://monitor.test/CallWatch')).toBeUndefined()
  })
})

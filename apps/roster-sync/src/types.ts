/**
 * Roster Sync Core Types
 *
 * Observed rows come from the directory, identity records go into the
 * code plug stores.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Observation
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One row of the monitoring directory. Never persisted.
 */
export interface ObservedRow {
  /** Radio ID of the transmitting unit */
  identifier: number

  /** Talk-group label (a name on CallWatch, a numeric id on the backend) */
  group: string

  /** Network label, e.g. "AZ-TRBONET" */
  network: string
}

/**
 * Producer of observed rows for one snapshot of the directory.
 *
 * The sequence is finite and not restartable: consume it once.
 * Rows that cannot be parsed are dropped by the producer.
 */
export interface TableSource {
  readonly id: SourceMode
  produce(): AsyncIterable<ObservedRow>
}

export type SourceMode = 'callwatch' | 'backend'

/**
 * How rows are sorted into the two interest sets.
 */
export interface ClassificationCriteria {
  /** Tokens identifying the group of interest */
  groupTokens: string[]

  /** `exact` compares the whole label, `substring` looks for the token inside it */
  groupMatch: 'exact' | 'substring'

  /** Network label whose unknown identifiers are candidates for the main roster */
  networkToken: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Roster State
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The atomic unit of roster state. Persisted as RADIO_ID, CALLSIGN, FIRST_NAME, STATE.
 */
export interface IdentityRecord {
  identifier: number
  callsign: string
  firstName: string
  state: string
}

/** Identifier unique after every merge */
export type MainRoster = IdentityRecord[]

/** Append-only log of records added to the main roster */
export type AuditTrail = IdentityRecord[]

/** Members of the group of interest, identifier unique */
export type GroupRoster = IdentityRecord[]

export interface RosterState {
  main: MainRoster
  audit: AuditTrail
  group: GroupRoster
}

// ═══════════════════════════════════════════════════════════════════════════════
// Identity Lookup
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One entry of a lookup response, as returned by the identity API.
 */
export interface LookupEntry {
  id: number
  callsign: string
  fname: string
  state: string
}

/**
 * The two capabilities the enricher needs. Both reject on transport
 * failure, timeout or malformed response, and resolve to an empty
 * array when the API knows nothing.
 */
export interface IdentityLookup {
  lookupById(identifier: number): Promise<LookupEntry[]>
  lookupByCallsign(callsign: string): Promise<LookupEntry[]>
}

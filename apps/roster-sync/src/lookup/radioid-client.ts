/**
 * RadioID identity lookup client
 *
 * Two unauthenticated GET endpoints on the same base URL:
 *   ?id=<radio id>        -> zero or one entry
 *   ?callsign=<callsign>  -> every radio id registered to the callsign
 *
 * No retries; each call is bounded by the configured timeout.
 */

import { z } from 'zod'
import { EnrichmentFault, FAULT_CODES } from '../errors.js'
import type { Fetcher } from '../source/fetch/types.js'
import { NO_RETRY_POLICY } from '../source/fetch/types.js'
import type { IdentityLookup, LookupEntry } from '../types.js'

const text = z
  .string()
  .nullish()
  .transform((value) => (value ?? '').trim())

const entrySchema = z.object({
  id: z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/).transform(Number)]),
  callsign: z.string().trim().min(1),
  fname: text,
  state: text,
})

const responseSchema = z.object({
  results: z
    .array(z.unknown())
    .nullish()
    .transform((value) => value ?? []),
})

export interface RadioIdClientOptions {
  baseUrl: string
  timeoutMs: number
  fetcher: Fetcher
}

export class RadioIdClient implements IdentityLookup {
  private readonly options: RadioIdClientOptions

  constructor(options: RadioIdClientOptions) {
    this.options = options
  }

  lookupById(identifier: number): Promise<LookupEntry[]> {
    return this.query('id', String(identifier))
  }

  lookupByCallsign(callsign: string): Promise<LookupEntry[]> {
    return this.query('callsign', callsign)
  }

  buildUrl(param: 'id' | 'callsign', value: string): string {
    const url = new URL(this.options.baseUrl)
    url.searchParams.set(param, value)
    return url.toString()
  }

  private async query(param: 'id' | 'callsign', value: string): Promise<LookupEntry[]> {
    const details = { param, value }
    const result = await this.options.fetcher.fetch(this.buildUrl(param, value), {
      headers: { Accept: 'application/json' },
      timeoutMs: this.options.timeoutMs,
      retryPolicy: NO_RETRY_POLICY,
    })

    if (result.status === 'timeout') {
      throw new EnrichmentFault(FAULT_CODES.LOOKUP_TIMEOUT, result.error ?? 'Lookup timed out', { details })
    }
    if (result.status !== 'ok' || result.body === undefined) {
      throw new EnrichmentFault(FAULT_CODES.LOOKUP_FAILED, result.error ?? `Lookup ${result.status}`, {
        details: { ...details, statusCode: result.statusCode },
      })
    }

    let payload: unknown
    try {
      payload = JSON.parse(result.body)
    } catch (error) {
      throw new EnrichmentFault(FAULT_CODES.LOOKUP_MALFORMED, 'Lookup returned invalid JSON', {
        cause: error,
        details,
      })
    }

    const parsed = responseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new EnrichmentFault(FAULT_CODES.LOOKUP_MALFORMED, 'Lookup response has no results list', {
        cause: parsed.error,
        details,
      })
    }

    return parsed.data.results.flatMap((raw) => {
      const entry = entrySchema.safeParse(raw)
      return entry.success ? [entry.data] : []
    })
  }
}

/**
 * Structured logging helpers for sync cycles.
 *
 * Every event of a cycle carries the same envelope (workflow, stage, runId)
 * so one run can be followed across stages. URLs are logged as
 * host/path/hash, never with their query string.
 */

import { createHash } from 'node:crypto'
import type { ILogger } from '@codeplug/logger'

export type WorkflowContext = {
  workflow: string
  stage: string
  runId?: string
  source?: string
  identifier?: number
  page?: number
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

export interface WorkflowLogger {
  debug(event: string, meta?: LogMeta): void
  info(event: string, meta?: LogMeta): void
  warn(event: string, meta?: LogMeta, err?: unknown): void
  error(event: string, meta?: LogMeta, err?: unknown): void
  fatal(event: string, meta?: LogMeta, err?: unknown): void
  child(extra: Partial<WorkflowContext>): WorkflowLogger
}

export function createWorkflowLogger(base: ILogger, context: WorkflowContext): WorkflowLogger {
  const baseContext = compact(context)

  const payload = (event: string, meta?: LogMeta): LogMeta => ({
    event_name: event,
    ...baseContext,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    fatal: (event, meta, err) => base.fatal(event, payload(event, meta), err),
    child: (extra) => createWorkflowLogger(base, Object.assign({}, context, extra)),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}${parsed.search}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

function compact(value: Record<string, unknown>): LogMeta {
  const next: LogMeta = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}

/**
 * Fault Taxonomy and Classification
 *
 * Fatal faults end the cycle before anything is persisted (PersistFault is
 * raised while persisting). Row and enrichment faults are recovered where
 * they happen and only show up in logs and counters.
 */

import { ZodError } from 'zod'

export type FaultKind =
  | 'setup' // Session could not be initialized or authenticated
  | 'source_unreachable' // Directory unreachable or returned no rows
  | 'load' // A roster file could not be read
  | 'row' // One observed row could not be parsed
  | 'enrichment' // One identity lookup failed
  | 'persist' // A roster file could not be written
  | 'config' // Invalid settings or flags
  | 'internal' // Anything unexpected

export const FAULT_CODES = {
  SESSION_INIT_FAILED: 'SESSION_INIT_FAILED',
  LOGIN_FAILED: 'LOGIN_FAILED',
  SOURCE_UNREACHABLE: 'SOURCE_UNREACHABLE',
  NO_ROWS_OBSERVED: 'NO_ROWS_OBSERVED',
  ROSTER_UNREADABLE: 'ROSTER_UNREADABLE',
  ROSTER_MALFORMED: 'ROSTER_MALFORMED',
  ROW_UNPARSABLE: 'ROW_UNPARSABLE',
  LOOKUP_FAILED: 'LOOKUP_FAILED',
  LOOKUP_TIMEOUT: 'LOOKUP_TIMEOUT',
  LOOKUP_MALFORMED: 'LOOKUP_MALFORMED',
  ROSTER_WRITE_FAILED: 'ROSTER_WRITE_FAILED',
  INVALID_CONFIG: 'INVALID_CONFIG',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type FaultCode = (typeof FAULT_CODES)[keyof typeof FAULT_CODES]

/** Process exit codes */
export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const

export interface FaultOptions {
  cause?: unknown
  details?: Record<string, unknown>
}

export abstract class PipelineFault extends Error {
  abstract readonly kind: FaultKind
  abstract readonly fatal: boolean
  readonly code: FaultCode
  readonly details?: Record<string, unknown>

  constructor(code: FaultCode, message: string, options: FaultOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.code = code
    this.details = options.details
  }
}

export class SetupFault extends PipelineFault {
  readonly kind = 'setup'
  readonly fatal = true
}

export class SourceUnreachableFault extends PipelineFault {
  readonly kind = 'source_unreachable'
  readonly fatal = true
}

export class LoadFault extends PipelineFault {
  readonly kind = 'load'
  readonly fatal = true
}

export class RowFault extends PipelineFault {
  readonly kind = 'row'
  readonly fatal = false
}

export class EnrichmentFault extends PipelineFault {
  readonly kind = 'enrichment'
  readonly fatal = false
}

export class PersistFault extends PipelineFault {
  readonly kind = 'persist'
  readonly fatal = true
}

export class ConfigFault extends PipelineFault {
  readonly kind = 'config'
  readonly fatal = true
}

/**
 * Structured fault information for logging and exit handling
 */
export interface ClassifiedFault {
  kind: FaultKind
  code: string
  message: string
  exitCode: number
  isOperational: boolean // Expected faults vs bugs
  details?: Record<string, unknown>
  originalError?: Error
}

function exitCodeFor(kind: FaultKind): number {
  return kind === 'config' ? EXIT_CODES.USAGE : EXIT_CODES.FAILURE
}

/**
 * Classify any thrown value into a structured fault
 */
export function classifyFault(error: unknown): ClassifiedFault {
  if (error instanceof PipelineFault) {
    return {
      kind: error.kind,
      code: error.code,
      message: error.message,
      exitCode: exitCodeFor(error.kind),
      isOperational: true,
      details: error.details,
      originalError: error,
    }
  }

  if (error instanceof ZodError) {
    return {
      kind: 'config',
      code: FAULT_CODES.INVALID_CONFIG,
      message: formatZodIssues(error),
      exitCode: EXIT_CODES.USAGE,
      isOperational: true,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    return {
      kind: 'internal',
      code: FAULT_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      exitCode: EXIT_CODES.FAILURE,
      isOperational: false,
      originalError: error,
    }
  }

  return {
    kind: 'internal',
    code: FAULT_CODES.UNEXPECTED_ERROR,
    message: String(error),
    exitCode: EXIT_CODES.FAILURE,
    isOperational: false,
  }
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Fetcher types shared by table sources and the identity lookup client.
 */

/**
 * Abstraction over HTTP fetching so sources and clients can be tested
 * against a stand-in.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** GET unless a form is posted */
  method?: 'GET' | 'POST'

  /** URL-encoded form body (implies POST) */
  form?: Record<string, string>

  /** Request timeout in ms (default: 15000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 5MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** `manual` returns 3xx responses as ok instead of following them */
  redirect?: 'follow' | 'manual'

  /** Overrides the fetcher's retry policy for this request */
  retryPolicy?: RetryPolicy
}

export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'codeplug-sync/0.1 (roster maintenance)',
  Accept: 'text/html,application/xhtml+xml,application/json',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 15000,
  maxSizeBytes: 5 * 1024 * 1024, // 5 MB
} as const

export type FetchResultStatus =
  | 'ok'
  | 'error'
  | 'blocked'
  | 'timeout'
  | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  body?: string
  /** Final URL after redirects */
  url?: string
  /** Raw Set-Cookie header values */
  setCookies?: string[]
  error?: string
  durationMs: number
}

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

/**
 * One read plus at most one retry. Directory pages use this.
 */
export const SINGLE_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  initialDelayMs: 500,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

/**
 * Identity lookups are never retried.
 */
export const NO_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 0,
  maxDelayMs: 0,
  backoffMultiplier: 1,
  retryableStatusCodes: [],
}

/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch. Supports timeout, size limits, retries and form posts.
 * Never throws for transport problems: every outcome is a FetchResult.
 */

import type { Fetcher, FetchOptions, FetchResult, RetryPolicy } from './types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, SINGLE_RETRY_POLICY } from './types.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Default timeout for requests that do not set one */
  timeoutMs?: number
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly timeoutMs: number

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? SINGLE_RETRY_POLICY
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const policy = options.retryPolicy ?? this.retryPolicy

    const headers: Record<string, string> = {
      ...DEFAULT_FETCH_HEADERS,
      ...(options.headers ?? {}),
    }

    let lastError: Error | null = null

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      try {
        const result = await this.fetchOnce(url, headers, options, startTime)

        const retryable =
          (result.status === 'error' &&
            result.statusCode !== undefined &&
            policy.retryableStatusCodes.includes(result.statusCode)) ||
          result.status === 'timeout'

        if (retryable && attempt < policy.maxAttempts) {
          await this.sleep(this.backoff(policy, attempt))
          continue
        }

        return result
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error))

        if (attempt < policy.maxAttempts) {
          await this.sleep(this.backoff(policy, attempt))
          continue
        }
      }
    }

    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError?.message ?? 'Unknown error after retries',
    }
  }

  /**
   * Single fetch attempt (no retries). Throws only for transport errors.
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    opts: FetchOptions,
    startTime: number
  ): Promise<FetchResult> {
    const timeoutMs = opts.timeoutMs ?? this.timeoutMs
    const maxSizeBytes = opts.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
    const manualRedirect = opts.redirect === 'manual'
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    const init: RequestInit = {
      method: opts.form ? 'POST' : (opts.method ?? 'GET'),
      headers,
      signal: controller.signal,
      redirect: manualRedirect ? 'manual' : 'follow',
    }
    if (opts.form) {
      init.body = new URLSearchParams(opts.form).toString()
      init.headers = { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' }
    }

    try {
      const response = await fetch(url, init)
      const setCookies = response.headers.getSetCookie()
      const isRedirect = response.status >= 300 && response.status < 400

      if (response.status === 401 || response.status === 403) {
        await response.body?.cancel()
        return {
          status: 'blocked',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: access denied`,
        }
      }

      if (!response.ok && !(manualRedirect && isRedirect)) {
        await response.body?.cancel()
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        await response.body?.cancel()
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await this.readBodyWithLimit(response, maxSizeBytes)
      if (body === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        body,
        url: response.url || url,
        setCookies,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      for (;;) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  private backoff(policy: RetryPolicy, attempt: number): number {
    return Math.min(
      policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
      policy.maxDelayMs
    )
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}

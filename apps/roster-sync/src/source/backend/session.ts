/**
 * Backend login
 *
 * The backend authenticates with a plain form post and tracks the session
 * with a cookie, which every later page request must carry.
 */

import type { ILogger } from '@codeplug/logger'
import { FAULT_CODES, SetupFault } from '../../errors.js'
import type { Fetcher } from '../fetch/types.js'
import { NO_RETRY_POLICY } from '../fetch/types.js'
import { LOGIN_FIELDS } from './selectors.js'

export interface BackendSession {
  /** Value for the Cookie request header */
  cookie: string
}

export interface LoginOptions {
  baseUrl: string
  user?: string
  password?: string
  timeoutMs: number
  fetcher: Fetcher
  logger: ILogger
}

/**
 * `name=value` pairs from Set-Cookie headers, attributes dropped.
 * Later values win for the same name.
 */
export function cookiePairs(setCookies: string[] = []): Map<string, string> {
  const pairs = new Map<string, string>()
  for (const header of setCookies) {
    const [pair] = header.split(';')
    const eq = pair.indexOf('=')
    if (eq <= 0) continue
    pairs.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim())
  }
  return pairs
}

function toCookieHeader(pairs: Map<string, string>): string {
  return [...pairs].map(([name, value]) => `${name}=${value}`).join('; ')
}

export async function login(options: LoginOptions): Promise<BackendSession> {
  const { baseUrl, user, password, fetcher, timeoutMs, logger } = options

  if (!user || !password) {
    throw new SetupFault(FAULT_CODES.LOGIN_FAILED, 'Backend login requires a username and a password')
  }

  logger.info('Navigating to login page', { user })
  const landing = await fetcher.fetch(baseUrl, { timeoutMs, retryPolicy: NO_RETRY_POLICY })
  if (landing.status !== 'ok') {
    throw new SetupFault(
      FAULT_CODES.SESSION_INIT_FAILED,
      `Unable to open login page: ${landing.error ?? landing.status}`,
      { details: { status: landing.status, statusCode: landing.statusCode } }
    )
  }

  const pairs = cookiePairs(landing.setCookies)

  const submitted = await fetcher.fetch(baseUrl, {
    form: {
      [LOGIN_FIELDS.user]: user,
      [LOGIN_FIELDS.password]: password,
      [LOGIN_FIELDS.submit]: LOGIN_FIELDS.submit,
    },
    headers: pairs.size > 0 ? { Cookie: toCookieHeader(pairs) } : {},
    redirect: 'manual',
    timeoutMs,
    retryPolicy: NO_RETRY_POLICY,
  })

  if (submitted.status !== 'ok') {
    throw new SetupFault(
      FAULT_CODES.LOGIN_FAILED,
      `Login failed: ${submitted.error ?? submitted.status}`,
      { details: { status: submitted.status, statusCode: submitted.statusCode } }
    )
  }

  for (const [name, value] of cookiePairs(submitted.setCookies)) {
    pairs.set(name, value)
  }

  if (pairs.size === 0) {
    throw new SetupFault(FAULT_CODES.LOGIN_FAILED, 'Login returned no session cookie')
  }

  logger.info('Login submitted', { sessionFields: pairs.size })
  return { cookie: toCookieHeader(pairs) }
}

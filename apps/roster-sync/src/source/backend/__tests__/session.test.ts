import { describe, it, expect } from 'vitest'
import { cookiePairs, login } from '../session.js'
import { SetupFault } from '../../../errors.js'
import { FakeFetcher, createTestLogger, failedResult, okResult } from '../../../__tests__/helpers.js'

const BASE_URL = 'http://backend.test'

describe('cookiePairs', () => {
  it('keeps name and value and drops attributes', () => {
    const pairs = cookiePairs(['ASP.NET_SessionId=abc; path=/; HttpOnly', 'theme=dark', 'theme=light; path=/'])

    expect([...pairs]).toEqual([
      ['ASP.NET_SessionId', 'abc'],
      ['theme', 'light'],
    ])
  })

  it('ignores malformed headers', () => {
    expect(cookiePairs(['=nameless', 'novalue']).size).toBe(0)
  })
})

describe('login', () => {
  const credentials = { baseUrl: BASE_URL, user: 'operator', password: 'test-secret', timeoutMs: 1000 }

  it('posts the login form and merges session cookies', async () => {
    const fetcher = new FakeFetcher().on(
      BASE_URL,
      okResult('<form></form>', { setCookies: ['ASP.NET_SessionId=abc; path=/'] }),
      okResult('', { statusCode: 302, setCookies: ['.ASPXAUTH=tok; path=/; HttpOnly'] })
    )

    const session = await login({ ...credentials, fetcher, logger: createTestLogger() })

    expect(session.cookie).toBe('ASP.NET_SessionId=abc; .ASPXAUTH=tok')
    expect(fetcher.calls[1].options).toMatchObject({
      form: { user: 'operator', pass: 'test-secret', Login: 'Login' },
      headers: { Cookie: 'ASP.NET_SessionId=abc' },
      redirect: 'manual',
    })
  })

  it('requires both credentials', async () => {
    const fetcher = new FakeFetcher()

    await expect(
      login({ ...credentials, password: undefined, fetcher, logger: createTestLogger() })
    ).rejects.toMatchObject({ code: 'LOGIN_FAILED' })
    expect(fetcher.calls).toEqual([])
  })

  it('fails session setup when the login page is unreachable', async () => {
    const fetcher = new FakeFetcher().on(BASE_URL, failedResult('timeout'))

    const session = login({ ...credentials, fetcher, logger: createTestLogger() })

    await expect(session).rejects.toBeInstanceOf(SetupFault)
    await expect(session).rejects.toMatchObject({ code: 'SESSION_INIT_FAILED' })
  })

  it('fails when the form post is rejected', async () => {
    const fetcher = new FakeFetcher().on(BASE_URL, okResult('<form></form>'), failedResult('blocked', 403))

    await expect(login({ ...credentials, fetcher, logger: createTestLogger() })).rejects.toMatchObject({
      code: 'LOGIN_FAILED',
      message: 'Login failed: HTTP 403',
    })
  })

  it('fails when no session cookie comes back', async () => {
    const fetcher = new FakeFetcher().on(BASE_URL, okResult('<form></form>'), okResult(''))

    await expect(login({ ...credentials, fetcher, logger: createTestLogger() })).rejects.toMatchObject({
      message: 'Login returned no session cookie',
    })
  })
})

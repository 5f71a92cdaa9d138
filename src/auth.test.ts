// Tests for the consent flow, with the browser/callback side replaced by a
// scripted ConsentTransport.

import { describe, expect, test } from 'vitest'
import { AuthError, FlowTimeoutError, UserDeclinedError } from './api-utils.js'
import { ConsentAuthorizationFlow, extractCodeFromInput, type ConsentResult, type ConsentTransport } from './auth.js'
import { FakeOAuthClient } from './test-utils.js'

class ScriptedTransport implements ConsentTransport {
  urls: string[] = []
  signal: AbortSignal | null = null

  constructor(private answer: ConsentResult | null) {}

  requestCode(authUrl: string, signal: AbortSignal): Promise<ConsentResult> {
    this.urls.push(authUrl)
    this.signal = signal
    if (this.answer === null) return new Promise(() => {})
    return Promise.resolve(this.answer)
  }
}

describe('ConsentAuthorizationFlow', () => {
  test('exchanges the code for a credential', async () => {
    const oauth = new FakeOAuthClient()
    const transport = new ScriptedTransport({ type: 'code', code: 'test-code' })
    const flow = new ConsentAuthorizationFlow({ oauth, transport, scopes: ['scope-a'] })

    const credential = await flow.obtain()

    expect(credential).toEqual({
      accessToken: 'test-exchanged-access',
      refreshToken: 'test-exchanged-refresh',
      expiry: new Date('2030-06-01T00:00:00.000Z'),
      scopes: ['https://www.googleapis.com/auth/gmail.modify'],
    })
    expect(transport.urls).toEqual(['https://accounts.example.test/auth?scope=scope-a'])
    expect(transport.signal?.aborted).toBe(true)
  })

  test('falls back to the requested scopes when the response lists none', async () => {
    const oauth = new FakeOAuthClient()
    oauth.exchangeResult = { ...oauth.exchangeResult, scopes: [] }
    const flow = new ConsentAuthorizationFlow({
      oauth,
      transport: new ScriptedTransport({ type: 'code', code: 'test-code' }),
      scopes: ['scope-a', 'scope-b'],
    })

    const credential = await flow.obtain()
    if (credential instanceof Error) throw credential
    expect(credential.scopes).toEqual(['scope-a', 'scope-b'])
  })

  test('access_denied is a declined consent', async () => {
    const flow = new ConsentAuthorizationFlow({
      oauth: new FakeOAuthClient(),
      transport: new ScriptedTransport({ type: 'error', error: 'access_denied' }),
    })
    expect(await flow.obtain()).toBeInstanceOf(UserDeclinedError)
  })

  test('times out and releases the transport', async () => {
    const transport = new ScriptedTransport(null)
    const flow = new ConsentAuthorizationFlow({ oauth: new FakeOAuthClient(), transport, timeoutMs: 20 })

    const result = await flow.obtain()

    expect(result).toBeInstanceOf(FlowTimeoutError)
    expect(transport.signal?.aborted).toBe(true)
  })

  test('a token response without a refresh token is an auth error', async () => {
    const oauth = new FakeOAuthClient()
    oauth.exchangeResult = { ...oauth.exchangeResult, refreshToken: undefined }
    const flow = new ConsentAuthorizationFlow({
      oauth,
      transport: new ScriptedTransport({ type: 'code', code: 'test-code' }),
    })
    expect(await flow.obtain()).toBeInstanceOf(AuthError)
  })
})

describe('extractCodeFromInput', () => {
  test('reads the code from a pasted redirect URL', () => {
    expect(extractCodeFromInput('http://localhost:8089/?code=4/test-code&scope=gmail')).toBe('4/test-code')
  })

  test('accepts a bare code and rejects short or empty input', () => {
    expect(extractCodeFromInput('  test-code-value  ')).toBe('test-code-value')
    expect(extractCodeFromInput('short')).toBeNull()
    expect(extractCodeFromInput('')).toBeNull()
  })
})

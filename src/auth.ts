// OAuth2 authorization for mailwright.
// AuthorizationFlow obtains a fresh credential through interactive consent:
// it builds the consent URL, hands it to a ConsentTransport (local callback
// listener + pasted redirect URL), waits for the authorization code with a
// bounded timeout, and exchanges the code for tokens. It never persists;
// the caller saves the result through CredentialStore.
// Token endpoint calls go through OAuthTokenClient so the flow and the Gmail
// client can be exercised with fakes.

import http from 'node:http'
import readline from 'node:readline'
import { OAuth2Client, type Credentials } from 'google-auth-library'
import fkill from 'fkill'
import pc from 'picocolors'
import * as errore from 'errore'
import { AuthError, FlowTimeoutError, UserDeclinedError, describeError } from './api-utils.js'
import type { Credential } from './credential-store.js'
import type { ClientSecret } from './config.js'

export const GMAIL_SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/gmail.send',
  'https://www.googleapis.com/auth/gmail.compose',
  'https://www.googleapis.com/auth/gmail.modify',
]

export const DEFAULT_CONSENT_TIMEOUT_MS = 5 * 60 * 1000

// Google reports an expiry on every token response; this only covers a
// response that omits it.
const FALLBACK_TOKEN_LIFETIME_MS = 60 * 60 * 1000

// ---------------------------------------------------------------------------
// Token endpoint
// ---------------------------------------------------------------------------

export interface TokenSet {
  accessToken: string
  /** Google omits the refresh token from most refresh responses. */
  refreshToken?: string
  expiry: Date
  scopes: string[]
}

export interface OAuthTokenClient {
  generateAuthUrl(scopes: string[]): string
  exchangeCode(code: string): Promise<TokenSet>
  refresh(refreshToken: string): Promise<TokenSet>
  revoke(token: string): Promise<void>
}

/** google-auth-library backed token client. */
export class GoogleOAuthClient implements OAuthTokenClient {
  private secret: ClientSecret

  constructor(secret: ClientSecret) {
    this.secret = secret
  }

  private createClient(): OAuth2Client {
    return new OAuth2Client({
      clientId: this.secret.clientId,
      clientSecret: this.secret.clientSecret,
      redirectUri: this.secret.redirectUri,
    })
  }

  generateAuthUrl(scopes: string[]): string {
    return this.createClient().generateAuthUrl({
      access_type: 'offline',
      scope: scopes,
      prompt: 'consent', // force a refresh token on every consent
    })
  }

  async exchangeCode(code: string): Promise<TokenSet> {
    const { tokens } = await this.createClient().getToken(code)
    return toTokenSet(tokens)
  }

  async refresh(refreshToken: string): Promise<TokenSet> {
    const client = this.createClient()
    client.setCredentials({ refresh_token: refreshToken })
    const { credentials } = await client.refreshAccessToken()
    return toTokenSet(credentials)
  }

  async revoke(token: string): Promise<void> {
    await this.createClient().revokeToken(token)
  }
}

function toTokenSet(tokens: Credentials): TokenSet {
  if (!tokens.access_token) {
    throw new Error('Token response did not include an access token')
  }
  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? undefined,
    expiry: new Date(tokens.expiry_date ?? Date.now() + FALLBACK_TOKEN_LIFETIME_MS),
    scopes: tokens.scope ? tokens.scope.split(' ').filter(Boolean) : [],
  }
}

// ---------------------------------------------------------------------------
// Consent transport (browser redirect / pasted URL)
// ---------------------------------------------------------------------------

export type ConsentResult =
  | { type: 'code'; code: string }
  | { type: 'error'; error: string }

export interface ConsentTransport {
  /** Show `authUrl` to the user and resolve with the redirect outcome.
   *  Must release its resources when `signal` aborts. */
  requestCode(authUrl: string, signal: AbortSignal): Promise<ConsentResult>
}

export function extractCodeFromInput(input: string): string | null {
  const trimmed = input.trim()
  if (!trimmed) return null

  try {
    const url = new URL(trimmed)
    const code = url.searchParams.get('code')
    if (code) return code
  } catch {
    // Not a URL: fall through to treating the input as a bare code
  }

  if (trimmed.length > 10 && !trimmed.includes(' ')) {
    return trimmed
  }

  return null
}

/** Listens on the redirect URI's port for Google's callback. On a TTY it also
 *  accepts the redirect URL pasted by hand, for remote/headless machines where
 *  the browser cannot reach localhost. */
export class LocalCallbackTransport implements ConsentTransport {
  private port: number

  constructor({ redirectUri }: { redirectUri: string }) {
    const url = new URL(redirectUri)
    this.port = Number(url.port || 80)
  }

  async requestCode(authUrl: string, signal: AbortSignal): Promise<ConsentResult> {
    // A previous, interrupted login may still hold the port
    await fkill(`:${this.port}`, { force: true, silent: true }).catch(() => undefined)

    process.stderr.write('\n' + pc.bold('1.') + ' Open this URL to authorize:\n\n')
    process.stderr.write('   ' + pc.cyan(pc.underline(authUrl)) + '\n\n')
    process.stderr.write(pc.bold('2.') + ' If running locally, the browser will redirect automatically.\n')
    process.stderr.write(pc.dim('   If running remotely, copy the URL from the browser address bar and paste it below.') + '\n\n')

    return new Promise((resolve, reject) => {
      let settled = false
      let server: http.Server | null = null
      let rl: readline.Interface | null = null

      function cleanup() {
        server?.close()
        if (rl) {
          rl.close()
          process.stdin.unref()
        }
        signal.removeEventListener('abort', onAbort)
      }

      function finish(result: ConsentResult) {
        if (settled) return
        settled = true
        cleanup()
        resolve(result)
      }

      function fail(err: Error) {
        if (settled) return
        settled = true
        cleanup()
        reject(err)
      }

      function onAbort() {
        finish({ type: 'error', error: 'aborted' })
      }

      signal.addEventListener('abort', onAbort, { once: true })

      server = http.createServer((req, res) => {
        const url = new URL(req.url ?? '/', `http://localhost:${this.port}`)
        const code = url.searchParams.get('code')
        const error = url.searchParams.get('error')

        if (error) {
          res.writeHead(400, { 'Content-Type': 'text/html' })
          res.end('<h1>Authorization was not granted. You can close this window.</h1>')
          finish({ type: 'error', error })
          return
        }

        if (code) {
          res.writeHead(200, { 'Content-Type': 'text/html' })
          res.end('<h1>Success! You can close this window.</h1>')
          finish({ type: 'code', code })
          return
        }

        res.writeHead(400, { 'Content-Type': 'text/html' })
        res.end('<h1>No authorization code received</h1>')
      })

      server.on('error', fail)
      server.listen(this.port)

      if (process.stdin.isTTY) {
        rl = readline.createInterface({ input: process.stdin, output: process.stderr })
        rl.question(pc.dim('Paste redirect URL here (or wait for auto-redirect): '), (answer) => {
          const code = extractCodeFromInput(answer)
          if (code) {
            finish({ type: 'code', code })
          } else {
            process.stderr.write(pc.yellow('Could not extract authorization code from input.') + '\n')
            process.stderr.write(pc.dim('Waiting for browser redirect...') + '\n')
          }
        })
      }
    })
  }
}

// ---------------------------------------------------------------------------
// Authorization flow
// ---------------------------------------------------------------------------

export interface AuthorizationFlow {
  obtain(): Promise<Credential | UserDeclinedError | FlowTimeoutError | AuthError>
}

export class ConsentAuthorizationFlow implements AuthorizationFlow {
  private oauth: OAuthTokenClient
  private transport: ConsentTransport
  private scopes: string[]
  private timeoutMs: number

  constructor({
    oauth,
    transport,
    scopes = GMAIL_SCOPES,
    timeoutMs = DEFAULT_CONSENT_TIMEOUT_MS,
  }: {
    oauth: OAuthTokenClient
    transport: ConsentTransport
    scopes?: string[]
    timeoutMs?: number
  }) {
    this.oauth = oauth
    this.transport = transport
    this.scopes = scopes
    this.timeoutMs = timeoutMs
  }

  async obtain(): Promise<Credential | UserDeclinedError | FlowTimeoutError | AuthError> {
    const authUrl = this.oauth.generateAuthUrl(this.scopes)
    const consent = await this.waitForConsent(authUrl)
    if (consent instanceof Error) return consent

    if (consent.type === 'error') {
      if (consent.error === 'access_denied') {
        return new UserDeclinedError({ reason: 'consent screen returned access_denied' })
      }
      return new AuthError({ reason: `consent failed: ${consent.error}` })
    }

    const tokens = await errore.tryAsync({
      try: () => this.oauth.exchangeCode(consent.code),
      catch: (err) => new AuthError({ reason: `code exchange failed: ${describeError(err)}`, cause: err }),
    })
    if (tokens instanceof Error) return tokens

    if (!tokens.refreshToken) {
      return new AuthError({ reason: 'token response did not include a refresh token' })
    }

    return {
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiry: tokens.expiry,
      scopes: tokens.scopes.length > 0 ? tokens.scopes : this.scopes,
    }
  }

  private async waitForConsent(authUrl: string): Promise<ConsentResult | FlowTimeoutError | AuthError> {
    const controller = new AbortController()
    let timer: ReturnType<typeof setTimeout> | undefined

    const timeout = new Promise<FlowTimeoutError>((resolve) => {
      timer = setTimeout(() => {
        resolve(new FlowTimeoutError({ seconds: String(Math.round(this.timeoutMs / 1000)) }))
      }, this.timeoutMs)
    })

    const consent = errore.tryAsync({
      try: () => this.transport.requestCode(authUrl, controller.signal),
      catch: (err) => new AuthError({ reason: `consent listener failed: ${describeError(err)}`, cause: err }),
    })

    try {
      return await Promise.race([consent, timeout])
    } finally {
      clearTimeout(timer)
      controller.abort()
    }
  }
}

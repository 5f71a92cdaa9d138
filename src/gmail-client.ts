// Gmail API client for the processing loop.
// Wraps the @googleapis/gmail SDK behind a thin GmailTransport (raw
// gmail_v1.Schema$* in and out, one access token per call) and layers the
// credential lifecycle on top: load from CredentialStore, refresh ahead of
// expiry, clear on revocation, re-run AuthorizationFlow when asked.
// Every method returns tagged errors as values; transient failures are retried
// with bounded exponential backoff and surface as UnavailableError once the
// attempts run out.
//
// Outgoing mail (reply, draft, forward) carries a Message-ID derived from the
// source message id and the action kind, so an apply that crashed after Gmail
// accepted it can be detected with an rfc822msgid: search and not repeated.

import crypto from 'node:crypto'
import { gmail as gmailApi, type gmail_v1 } from '@googleapis/gmail'
import { OAuth2Client } from 'google-auth-library'
import { createMimeMessage } from 'mimetext'
import * as errore from 'errore'
import {
  withRetry,
  statusOf,
  isAuthLikeError,
  isNotFoundError,
  isRevocationError,
  isTransientError,
  describeError,
  AuthError,
  ApiError,
  CorruptStoreError,
  FlowTimeoutError,
  NotFoundError,
  UnavailableError,
  UserDeclinedError,
  type RetryOptions,
} from './api-utils.js'
import { isRefreshable, type Credential, type CredentialStore } from './credential-store.js'
import type { AuthorizationFlow, OAuthTokenClient } from './auth.js'
import type { Action } from './decision-policy.js'
import { isPlainAddress, replyRecipient } from './email-utils.js'
import { renderEmailBody } from './output.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Message {
  id: string
  threadId: string
  labelIds: string[]
  /** First occurrence of each header, under the name it arrived with. */
  headers: Record<string, string>
  body: string
  snippet: string
}

export interface MessagePage {
  ids: string[]
  nextPageToken?: string
}

export type ApplyResult =
  | { status: 'applied'; remoteId?: string }
  | { status: 'already-applied' }
  | { status: 'noop' }

/** Failures of the credential lifecycle that end a call before it reaches Gmail. */
export type CredentialError = AuthError | UserDeclinedError | FlowTimeoutError | CorruptStoreError

export type ClientError = CredentialError | UnavailableError | ApiError

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface MessageMutation {
  addLabelIds?: string[]
  removeLabelIds?: string[]
}

export interface OutgoingMessage {
  raw: string
  threadId?: string
}

/** Raw Gmail REST operations. Implementations throw the library's errors;
 *  GmailClient classifies them. */
export interface GmailTransport {
  listMessages(
    accessToken: string,
    params: { q: string; maxResults: number; pageToken?: string },
  ): Promise<gmail_v1.Schema$ListMessagesResponse>
  getMessage(accessToken: string, id: string): Promise<gmail_v1.Schema$Message>
  sendMessage(accessToken: string, message: OutgoingMessage): Promise<gmail_v1.Schema$Message>
  createDraft(accessToken: string, message: OutgoingMessage): Promise<gmail_v1.Schema$Draft>
  modifyMessage(accessToken: string, id: string, mutation: MessageMutation): Promise<gmail_v1.Schema$Message>
  listLabels(accessToken: string): Promise<gmail_v1.Schema$Label[]>
  createLabel(accessToken: string, name: string): Promise<gmail_v1.Schema$Label>
  getProfile(accessToken: string): Promise<gmail_v1.Schema$Profile>
}

export const DEFAULT_CALL_TIMEOUT_MS = 30_000

export class GoogleGmailTransport implements GmailTransport {
  private auth = new OAuth2Client()
  private gmail: gmail_v1.Gmail
  private timeoutMs: number

  constructor({ timeoutMs = DEFAULT_CALL_TIMEOUT_MS }: { timeoutMs?: number } = {}) {
    this.gmail = gmailApi({ version: 'v1', auth: this.auth })
    this.timeoutMs = timeoutMs
  }

  // Access token only: a rejected token surfaces as a 401 for GmailClient to handle
  private use(accessToken: string) {
    this.auth.setCredentials({ access_token: accessToken })
    return { timeout: this.timeoutMs }
  }

  async listMessages(accessToken: string, { q, maxResults, pageToken }: { q: string; maxResults: number; pageToken?: string }) {
    const options = this.use(accessToken)
    const res = await this.gmail.users.messages.list({ userId: 'me', q, maxResults, pageToken }, options)
    return res.data
  }

  async getMessage(accessToken: string, id: string) {
    const options = this.use(accessToken)
    const res = await this.gmail.users.messages.get({ userId: 'me', id, format: 'full' }, options)
    return res.data
  }

  async sendMessage(accessToken: string, { raw, threadId }: OutgoingMessage) {
    const options = this.use(accessToken)
    const res = await this.gmail.users.messages.send({ userId: 'me', requestBody: { raw, threadId } }, options)
    return res.data
  }

  async createDraft(accessToken: string, { raw, threadId }: OutgoingMessage) {
    const options = this.use(accessToken)
    const res = await this.gmail.users.drafts.create({ userId: 'me', requestBody: { message: { raw, threadId } } }, options)
    return res.data
  }

  async modifyMessage(accessToken: string, id: string, { addLabelIds, removeLabelIds }: MessageMutation) {
    const options = this.use(accessToken)
    const res = await this.gmail.users.messages.modify(
      { userId: 'me', id, requestBody: { addLabelIds, removeLabelIds } },
      options,
    )
    return res.data
  }

  async listLabels(accessToken: string) {
    const options = this.use(accessToken)
    const res = await this.gmail.users.labels.list({ userId: 'me' }, options)
    return res.data.labels ?? []
  }

  async createLabel(accessToken: string, name: string) {
    const options = this.use(accessToken)
    const res = await this.gmail.users.labels.create(
      { userId: 'me', requestBody: { name, labelListVisibility: 'labelShow', messageListVisibility: 'show' } },
      options,
    )
    return res.data
  }

  async getProfile(accessToken: string) {
    const options = this.use(accessToken)
    const res = await this.gmail.users.getProfile({ userId: 'me' }, options)
    return res.data
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SYSTEM_LABEL_IDS = new Set([
  'INBOX',
  'TRASH',
  'SPAM',
  'DRAFT',
  'SENT',
  'STARRED',
  'UNREAD',
  'IMPORTANT',
  'CATEGORY_PERSONAL',
  'CATEGORY_SOCIAL',
  'CATEGORY_UPDATES',
  'CATEGORY_FORUMS',
  'CATEGORY_PROMOTIONS',
])

export const DEFAULT_MAX_RESULTS = 25
const REFRESH_SKEW_MS = 60_000
const MESSAGE_ID_DOMAIN = 'mailwright.local'

/** Gmail rejected the access token. Never leaves GmailClient: it either
 *  triggers the one refresh-and-retry or becomes an AuthError. */
class UnauthorizedError extends errore.createTaggedError({
  name: 'UnauthorizedError',
  message: '$operation rejected the access token',
}) {}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function decodeBase64Url(encoded: string) {
  const base64 = encoded.replace(/-/g, '+').replace(/_/g, '/')
  return Buffer.from(base64, 'base64').toString('utf-8')
}

export function encodeBase64Url(data: string | Buffer) {
  const buf = typeof data === 'string' ? Buffer.from(data) : data
  return buf.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '')
}

/** Case-insensitive header lookup. */
export function getHeader(message: Pick<Message, 'headers'>, name: string): string | undefined {
  const wanted = name.toLowerCase()
  for (const [key, value] of Object.entries(message.headers)) {
    if (key.toLowerCase() === wanted) return value
  }
  return undefined
}

/** Message-ID for the mail an action sends on behalf of `sourceId`. */
export function outgoingMessageId(sourceId: string, kind: Action['type']): string {
  const digest = crypto.createHash('sha256').update(`${sourceId}:${kind}`).digest('hex').slice(0, 32)
  return `<${digest}@${MESSAGE_ID_DOMAIN}>`
}

export function parseRawMessage(raw: gmail_v1.Schema$Message): Message {
  const headers: Record<string, string> = {}
  const seen = new Set<string>()
  for (const header of raw.payload?.headers ?? []) {
    if (!header.name) continue
    const key = header.name.toLowerCase()
    if (seen.has(key)) continue
    seen.add(key)
    headers[header.name] = header.value ?? ''
  }

  return {
    id: raw.id ?? '',
    threadId: raw.threadId ?? '',
    labelIds: raw.labelIds ?? [],
    headers,
    body: extractBody(raw.payload ?? {}),
    snippet: raw.snippet ?? '',
  }
}

/** Plain text wins; an HTML-only message is rendered to markdown. */
function extractBody(payload: gmail_v1.Schema$MessagePart): string {
  if (payload.body?.data && !payload.parts?.length) {
    return renderEmailBody(decodeBase64Url(payload.body.data), payload.mimeType ?? 'text/plain')
  }

  const parts = payload.parts ?? []
  const text = findBodyPart(parts, 'text/plain')
  if (text) return renderEmailBody(decodeBase64Url(text), 'text/plain')

  const html = findBodyPart(parts, 'text/html')
  if (html) return renderEmailBody(decodeBase64Url(html), 'text/html')

  return ''
}

function findBodyPart(parts: gmail_v1.Schema$MessagePart[], mimeType: string): string | null {
  for (const part of parts) {
    if (part.mimeType === mimeType && part.body?.data && !part.filename) {
      return part.body.data
    }
    if (part.parts) {
      const found = findBodyPart(part.parts, mimeType)
      if (found) return found
    }
  }
  return null
}

function prefixSubject(prefix: 'Re:' | 'Fwd:', subject: string): string {
  return subject.toLowerCase().startsWith(prefix.toLowerCase()) ? subject : `${prefix} ${subject}`
}

function bracketed(ref: string): string {
  let out = ref
  if (!out.startsWith('<')) out = `<${out}`
  if (!out.endsWith('>')) out = `${out}>`
  return out
}

// ---------------------------------------------------------------------------
// GmailClient
// ---------------------------------------------------------------------------

export class GmailClient {
  private store: CredentialStore
  private oauth: OAuthTokenClient
  private transport: GmailTransport
  private flow: AuthorizationFlow | undefined
  private retry: RetryOptions
  private maxResults: number
  private now: () => Date
  private labelIdCache = new Map<string, string>()
  private labelsLoaded = false
  private pendingCredential: Promise<Credential | ClientError> | null = null

  constructor({
    store,
    oauth,
    transport,
    flow,
    retry = {},
    maxResults = DEFAULT_MAX_RESULTS,
    now = () => new Date(),
  }: {
    store: CredentialStore
    oauth: OAuthTokenClient
    transport: GmailTransport
    /** Without a flow, a missing credential is an AuthError instead of a consent prompt. */
    flow?: AuthorizationFlow
    retry?: RetryOptions
    maxResults?: number
    now?: () => Date
  }) {
    this.store = store
    this.oauth = oauth
    this.transport = transport
    this.flow = flow
    this.retry = retry
    this.maxResults = maxResults
    this.now = now
  }

  // =========================================================================
  // Reads
  // =========================================================================

  async listMessages(
    query: string,
    { pageToken }: { pageToken?: string } = {},
  ): Promise<MessagePage | ClientError | NotFoundError> {
    const res = await this.call('messages.list', 'Message list', (token) =>
      this.transport.listMessages(token, { q: query, maxResults: this.maxResults, pageToken }),
    )
    if (res instanceof Error) return res

    return {
      ids: (res.messages ?? []).map((m) => m.id).filter((id): id is string => typeof id === 'string'),
      nextPageToken: res.nextPageToken ?? undefined,
    }
  }

  async getMessage(id: string): Promise<Message | NotFoundError | ClientError> {
    const res = await this.call('messages.get', `Message ${id}`, (token) => this.transport.getMessage(token, id))
    if (res instanceof Error) return res
    return parseRawMessage(res)
  }

  async getProfile(): Promise<{ emailAddress: string } | NotFoundError | ClientError> {
    const res = await this.call('users.getProfile', 'Profile', (token) => this.transport.getProfile(token))
    if (res instanceof Error) return res
    return { emailAddress: res.emailAddress ?? '' }
  }

  // =========================================================================
  // Actions
  // =========================================================================

  /** Apply one action to `message`. Issues at most one mutating call; with
   *  `verifyPrior`, outgoing mail is first looked up by its Message-ID. */
  async applyAction(
    message: Message,
    action: Action,
    { verifyPrior = false }: { verifyPrior?: boolean } = {},
  ): Promise<ApplyResult | NotFoundError | ClientError> {
    switch (action.type) {
      case 'noop':
        return { status: 'noop' }

      case 'archive': {
        const res = await this.call('messages.modify', `Message ${message.id}`, (token) =>
          this.transport.modifyMessage(token, message.id, { removeLabelIds: ['INBOX'] }),
        )
        if (res instanceof Error) return res
        return { status: 'applied', remoteId: res.id ?? undefined }
      }

      case 'label': {
        const labelId = await this.resolveLabelId(action.label)
        if (labelId instanceof Error) return labelId
        const res = await this.call('messages.modify', `Message ${message.id}`, (token) =>
          this.transport.modifyMessage(token, message.id, { addLabelIds: [labelId] }),
        )
        if (res instanceof Error) return res
        return { status: 'applied', remoteId: res.id ?? undefined }
      }

      case 'reply':
      case 'draft':
      case 'forward': {
        if (action.type === 'forward' && !isPlainAddress(action.to)) {
          return new ApiError({ reason: `refusing to forward ${message.id}: ${JSON.stringify(action.to)} is not a single email address` })
        }
        const messageId = outgoingMessageId(message.id, action.type)

        if (verifyPrior) {
          const prior = await this.findByMessageId(messageId)
          if (prior instanceof Error) return prior
          if (prior) return { status: 'already-applied' }
        }

        if (action.type === 'forward') {
          const raw = this.buildForward(message, action.to, messageId)
          const res = await this.call('messages.send', 'Forward', (token) => this.transport.sendMessage(token, { raw }))
          if (res instanceof Error) return res
          return { status: 'applied', remoteId: res.id ?? undefined }
        }

        const raw = this.buildReply(message, action.body, messageId)
        if (raw instanceof Error) return raw
        const outgoing = { raw, threadId: message.threadId }
        if (action.type === 'draft') {
          const res = await this.call('drafts.create', 'Draft', (token) => this.transport.createDraft(token, outgoing))
          if (res instanceof Error) return res
          return { status: 'applied', remoteId: res.id ?? undefined }
        }
        const res = await this.call('messages.send', 'Reply', (token) => this.transport.sendMessage(token, outgoing))
        if (res instanceof Error) return res
        return { status: 'applied', remoteId: res.id ?? undefined }
      }
    }
  }

  private async findByMessageId(messageId: string): Promise<boolean | NotFoundError | ClientError> {
    const q = `rfc822msgid:${messageId.replace(/^<|>$/g, '')} in:anywhere`
    const res = await this.call('messages.list', 'Message list', (token) =>
      this.transport.listMessages(token, { q, maxResults: 1 }),
    )
    if (res instanceof Error) return res
    return (res.messages ?? []).length > 0
  }

  // =========================================================================
  // Credential lifecycle
  // =========================================================================

  get canReauthorize(): boolean {
    return this.flow !== undefined
  }

  /** Run the authorization flow and persist the new credential. */
  async reauthorize(): Promise<Credential | CredentialError> {
    if (!this.flow) {
      return new AuthError({ reason: 'no stored credential and no authorization flow configured' })
    }
    const credential = await this.flow.obtain()
    if (credential instanceof Error) return credential
    this.store.save(credential)
    return credential
  }

  /** Concurrent callers share one load/refresh. */
  private currentCredential(): Promise<Credential | ClientError> {
    this.pendingCredential ??= this.loadCredential().finally(() => {
      this.pendingCredential = null
    })
    return this.pendingCredential
  }

  private async loadCredential(): Promise<Credential | ClientError> {
    const stored = this.store.load()
    if (stored instanceof Error) return stored
    if (!stored || !isRefreshable(stored)) return this.reauthorize()

    if (stored.expiry.getTime() - REFRESH_SKEW_MS > this.now().getTime()) return stored
    return this.refresh(stored)
  }

  private async refresh(credential: Credential): Promise<Credential | ClientError> {
    let attempts = 0
    let revoked = false
    const tokens = await errore.tryAsync({
      try: () =>
        withRetry(() => {
          attempts++
          return this.oauth.refresh(credential.refreshToken)
        }, { ...this.retry, shouldRetry: (err) => !isRevocationError(err) && isTransientError(err) }),
      catch: (err) => {
        if (isRevocationError(err)) {
          revoked = true
          return new AuthError({ reason: 'refresh token was revoked or expired (invalid_grant)', cause: err })
        }
        if (isTransientError(err)) {
          return new UnavailableError({ operation: 'token refresh', attempts: String(attempts), reason: describeError(err), cause: err })
        }
        return new AuthError({ reason: `token refresh failed: ${describeError(err)}`, cause: err })
      },
    })
    if (tokens instanceof Error) {
      // The stored refresh token is dead; the next run must go through consent
      if (revoked) this.store.clear()
      return tokens
    }

    const refreshed: Credential = {
      accessToken: tokens.accessToken,
      // Google usually omits the refresh token on refresh responses
      refreshToken: tokens.refreshToken ?? credential.refreshToken,
      expiry: tokens.expiry,
      scopes: tokens.scopes.length > 0 ? tokens.scopes : credential.scopes,
    }
    this.store.save(refreshed)
    return refreshed
  }

  /** Authorized Gmail call. A 401 triggers one refresh and exactly one more try. */
  private async call<T>(
    operation: string,
    resource: string,
    fn: (accessToken: string) => Promise<T>,
  ): Promise<T | NotFoundError | ClientError> {
    const credential = await this.currentCredential()
    if (credential instanceof Error) return credential

    const first = await this.attempt(operation, resource, () => fn(credential.accessToken))
    if (!(first instanceof UnauthorizedError)) return first

    const refreshed = await this.refresh(credential)
    if (refreshed instanceof Error) return refreshed

    const second = await this.attempt(operation, resource, () => fn(refreshed.accessToken))
    if (second instanceof UnauthorizedError) {
      return new AuthError({ reason: `${second.message} after a refresh`, cause: second })
    }
    return second
  }

  /** Boundary: retry transient failures, convert library exceptions to tagged errors. */
  private async attempt<T>(
    operation: string,
    resource: string,
    fn: () => Promise<T>,
  ): Promise<T | NotFoundError | UnauthorizedError | AuthError | UnavailableError | ApiError> {
    let attempts = 0
    return errore.tryAsync({
      try: () =>
        withRetry(() => {
          attempts++
          return fn()
        }, this.retry),
      catch: (err) => {
        if (statusOf(err) === 401) return new UnauthorizedError({ operation, cause: err })
        if (isNotFoundError(err)) return new NotFoundError({ resource, cause: err })
        if (isTransientError(err)) {
          return new UnavailableError({ operation, attempts: String(attempts), reason: describeError(err), cause: err })
        }
        if (isAuthLikeError(err)) return new AuthError({ reason: `${operation}: ${describeError(err)}`, cause: err })
        return new ApiError({ reason: `${operation}: ${describeError(err)}`, cause: err })
      },
    })
  }

  // =========================================================================
  // Labels
  // =========================================================================

  /** Label name to id. Lookups are cached per client; missing labels are created. */
  private async resolveLabelId(name: string): Promise<string | NotFoundError | ClientError> {
    if (SYSTEM_LABEL_IDS.has(name)) return name
    const key = name.toLowerCase()

    if (!this.labelsLoaded) {
      const labels = await this.call('labels.list', 'Labels', (token) => this.transport.listLabels(token))
      if (labels instanceof Error) return labels
      for (const label of labels) {
        if (label.id && label.name) this.labelIdCache.set(label.name.toLowerCase(), label.id)
      }
      this.labelsLoaded = true
    }

    const cached = this.labelIdCache.get(key)
    if (cached) return cached

    const created = await this.call('labels.create', `Label ${name}`, (token) => this.transport.createLabel(token, name))
    if (created instanceof Error) return created
    if (!created.id) return new ApiError({ reason: `labels.create returned no id for ${name}` })
    this.labelIdCache.set(key, created.id)
    return created.id
  }

  // =========================================================================
  // MIME composition
  // =========================================================================

  private buildReply(message: Message, body: string, messageId: string): string | ApiError {
    const recipient = replyRecipient({ replyTo: getHeader(message, 'reply-to'), from: getHeader(message, 'from') })
    if (!recipient) return new ApiError({ reason: `message ${message.id} has no address to reply to` })
    const originalId = getHeader(message, 'message-id')
    const references = [getHeader(message, 'references'), originalId].filter(Boolean).join(' ')

    return this.buildMimeMessage({
      to: [recipient],
      subject: prefixSubject('Re:', getHeader(message, 'subject') ?? ''),
      body,
      messageId,
      inReplyTo: originalId,
      references: references || undefined,
    })
  }

  private buildForward(message: Message, to: string, messageId: string): string {
    const subject = getHeader(message, 'subject') ?? ''
    const body = [
      '---------- Forwarded message ----------',
      `From: ${getHeader(message, 'from') ?? ''}`,
      `Date: ${getHeader(message, 'date') ?? ''}`,
      `Subject: ${subject}`,
      `To: ${getHeader(message, 'to') ?? ''}`,
      '',
      message.body,
    ].join('\n')

    return this.buildMimeMessage({ to: [{ email: to }], subject: prefixSubject('Fwd:', subject), body, messageId })
  }

  private buildMimeMessage({
    to,
    subject,
    body,
    messageId,
    inReplyTo,
    references,
  }: {
    to: Array<{ name?: string; email: string }>
    subject: string
    body: string
    messageId: string
    inReplyTo?: string
    references?: string
  }) {
    const msg = createMimeMessage()

    // Gmail replaces the From header with the authenticated user's address on send
    msg.setSender('me')
    msg.setRecipients(to.map((r) => ({ name: r.name ?? '', addr: r.email })))
    msg.setSubject(subject)
    msg.setHeader('Message-ID', messageId)
    msg.addMessage({ contentType: 'text/plain', data: body })

    if (inReplyTo) {
      msg.setHeader('In-Reply-To', bracketed(inReplyTo))
    }

    if (references) {
      const refs = references.split(/\s+/).filter(Boolean).map(bracketed)
      msg.setHeader('References', refs.join(' '))
    }

    return encodeBase64Url(msg.asRaw())
  }
}

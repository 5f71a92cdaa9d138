// In-process fakes for tests: a Gmail transport backed by a Map, an OAuth
// token client that counts refreshes, and small builders for raw Gmail
// messages and credentials. Nothing here touches the network.

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { gmail_v1 } from '@googleapis/gmail'
import type { OAuthTokenClient, TokenSet } from './auth.js'
import type { Credential } from './credential-store.js'
import { encodeBase64Url, type GmailTransport, type MessageMutation, type OutgoingMessage } from './gmail-client.js'
import type { Logger } from './orchestrator.js'

export function tempDir(prefix = 'mailwright-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export const silentLogger: Logger = { hint: () => {}, warn: () => {} }

/** Error shaped like a gaxios response error. */
export function httpError(status: number, message: string, data?: unknown): Error {
  return Object.assign(new Error(message), { code: status, status, response: { status, data } })
}

export function makeCredential(overrides: Partial<Credential> = {}): Credential {
  return {
    accessToken: 'test-access-token',
    refreshToken: 'test-refresh-token',
    expiry: new Date('2030-01-01T00:00:00.000Z'),
    scopes: ['https://www.googleapis.com/auth/gmail.modify'],
    ...overrides,
  }
}

export function rawMessage({
  id,
  threadId = `thread-${id}`,
  from = 'Alice <alice@example.com>',
  subject = 'Hello',
  body = 'Hi there',
  labelIds = ['INBOX', 'UNREAD'],
  headers = [],
}: {
  id: string
  threadId?: string
  from?: string
  subject?: string
  body?: string
  labelIds?: string[]
  headers?: Array<{ name: string; value: string }>
}): gmail_v1.Schema$Message {
  return {
    id,
    threadId,
    labelIds,
    snippet: body.slice(0, 40),
    payload: {
      mimeType: 'text/plain',
      headers: [
        { name: 'From', value: from },
        { name: 'To', value: 'me@example.com' },
        { name: 'Subject', value: subject },
        { name: 'Message-ID', value: `<${id}@mail.example.com>` },
        ...headers,
      ],
      body: { data: encodeBase64Url(body) },
    },
  }
}

export function decodeRaw(raw: string): string {
  return Buffer.from(raw.replace(/-/g, '+').replace(/_/g, '/'), 'base64').toString('utf-8')
}

function messageIdOf(raw: string): string | null {
  const match = /^message-id:\s*(\S+)/im.exec(decodeRaw(raw))
  return match?.[1] ?? null
}

type Operation = keyof GmailTransport

export class FakeGmailTransport implements GmailTransport {
  messages = new Map<string, gmail_v1.Schema$Message>()
  labels: gmail_v1.Schema$Label[] = []
  sent: OutgoingMessage[] = []
  drafts: OutgoingMessage[] = []
  modified: Array<{ id: string } & MessageMutation> = []
  calls: Record<Operation, number> = {
    listMessages: 0,
    getMessage: 0,
    sendMessage: 0,
    createDraft: 0,
    modifyMessage: 0,
    listLabels: 0,
    createLabel: 0,
    getProfile: 0,
  }
  tokensSeen: string[] = []
  /** Tokens answered with 401. */
  rejectedTokens = new Set<string>()
  private failures = new Map<Operation, Error[]>()

  constructor(messages: gmail_v1.Schema$Message[] = []) {
    for (const m of messages) {
      if (m.id) this.messages.set(m.id, m)
    }
  }

  /** Queue errors for the next calls of `op`; `Infinity` repeats forever. */
  failWith(op: Operation, error: Error, times = 1): void {
    const queue = this.failures.get(op) ?? []
    for (let i = 0; i < Math.min(times, 1000); i++) queue.push(error)
    this.failures.set(op, queue)
  }

  get mutationCount(): number {
    return this.calls.sendMessage + this.calls.createDraft + this.calls.modifyMessage
  }

  private enter(op: Operation, accessToken: string): void {
    this.calls[op]++
    this.tokensSeen.push(accessToken)
    if (this.rejectedTokens.has(accessToken)) throw httpError(401, 'Invalid Credentials')
    const queued = this.failures.get(op)?.shift()
    if (queued) throw queued
  }

  async listMessages(accessToken: string, { q, maxResults, pageToken }: { q: string; maxResults: number; pageToken?: string }) {
    this.enter('listMessages', accessToken)

    const wanted = /rfc822msgid:(\S+)/.exec(q)?.[1]
    if (wanted) {
      const found = [...this.sent, ...this.drafts].filter((m) => messageIdOf(m.raw) === `<${wanted}>`)
      return { messages: found.slice(0, maxResults).map((_, i) => ({ id: `outgoing-${i}` })) }
    }

    const ids = [...this.messages.keys()]
    const start = pageToken ? Number(pageToken) : 0
    const page = ids.slice(start, start + maxResults)
    const next = start + maxResults < ids.length ? String(start + maxResults) : undefined
    return { messages: page.map((id) => ({ id })), nextPageToken: next }
  }

  async getMessage(accessToken: string, id: string) {
    this.enter('getMessage', accessToken)
    const message = this.messages.get(id)
    if (!message) throw httpError(404, 'Requested entity was not found.')
    return message
  }

  async sendMessage(accessToken: string, message: OutgoingMessage) {
    this.enter('sendMessage', accessToken)
    this.sent.push(message)
    return { id: `sent-${this.sent.length}`, threadId: message.threadId }
  }

  async createDraft(accessToken: string, message: OutgoingMessage) {
    this.enter('createDraft', accessToken)
    this.drafts.push(message)
    return { id: `draft-${this.drafts.length}` }
  }

  async modifyMessage(accessToken: string, id: string, mutation: MessageMutation) {
    this.enter('modifyMessage', accessToken)
    const message = this.messages.get(id)
    if (!message) throw httpError(404, 'Requested entity was not found.')
    this.modified.push({ id, ...mutation })
    const labels = new Set(message.labelIds ?? [])
    for (const l of mutation.addLabelIds ?? []) labels.add(l)
    for (const l of mutation.removeLabelIds ?? []) labels.delete(l)
    message.labelIds = [...labels]
    return { id, labelIds: message.labelIds }
  }

  async listLabels(accessToken: string) {
    this.enter('listLabels', accessToken)
    return this.labels
  }

  async createLabel(accessToken: string, name: string) {
    this.enter('createLabel', accessToken)
    const label = { id: `Label_${this.labels.length + 1}`, name }
    this.labels.push(label)
    return label
  }

  async getProfile(accessToken: string) {
    this.enter('getProfile', accessToken)
    return { emailAddress: 'me@example.com' }
  }
}

export class FakeOAuthClient implements OAuthTokenClient {
  refreshCalls = 0
  revokedTokens: string[] = []
  /** Refresh answers invalid_grant, like Google after revocation. */
  revoked = false
  refreshError: Error | null = null
  exchangeResult: TokenSet = {
    accessToken: 'test-exchanged-access',
    refreshToken: 'test-exchanged-refresh',
    expiry: new Date('2030-06-01T00:00:00.000Z'),
    scopes: ['https://www.googleapis.com/auth/gmail.modify'],
  }
  nextExpiry = new Date('2031-01-01T00:00:00.000Z')

  generateAuthUrl(scopes: string[]): string {
    return `https://accounts.example.test/auth?scope=${encodeURIComponent(scopes.join(' '))}`
  }

  async exchangeCode(): Promise<TokenSet> {
    return this.exchangeResult
  }

  async refresh(): Promise<TokenSet> {
    this.refreshCalls++
    if (this.revoked) {
      throw httpError(400, 'invalid_grant', { error: 'invalid_grant', error_description: 'Token has been expired or revoked.' })
    }
    if (this.refreshError) throw this.refreshError
    return { accessToken: `test-refreshed-access-${this.refreshCalls}`, expiry: this.nextExpiry, scopes: [] }
  }

  async revoke(token: string): Promise<void> {
    this.revokedTokens.push(token)
  }
}

// Tests for GmailClient: message parsing, the credential lifecycle around
// each call, retry boundedness and action translation. Gmail and the token
// endpoint are in-process fakes.

import path from 'node:path'
import { beforeEach, describe, expect, test } from 'vitest'
import { ApiError, AuthError, NotFoundError, UnavailableError } from './api-utils.js'
import { CredentialStore } from './credential-store.js'
import { encodeBase64Url, getHeader, GmailClient, outgoingMessageId, parseRawMessage } from './gmail-client.js'
import {
  FakeGmailTransport,
  FakeOAuthClient,
  decodeRaw,
  httpError,
  makeCredential,
  rawMessage,
  tempDir,
} from './test-utils.js'

const NOW = new Date('2026-03-01T10:00:00.000Z')

let store: CredentialStore
let oauth: FakeOAuthClient
let transport: FakeGmailTransport
let delays: number[]

function createClient(overrides: Partial<ConstructorParameters<typeof GmailClient>[0]> = {}) {
  return new GmailClient({
    store,
    oauth,
    transport,
    retry: { sleep: async (ms) => void delays.push(ms), random: () => 0 },
    now: () => NOW,
    ...overrides,
  })
}

beforeEach(() => {
  store = new CredentialStore({ path: path.join(tempDir(), 'credentials.json') })
  oauth = new FakeOAuthClient()
  transport = new FakeGmailTransport([
    rawMessage({ id: 'm1', threadId: 't1', from: 'Alice <alice@example.com>', subject: 'Hello' }),
  ])
  delays = []
})

describe('parseRawMessage', () => {
  test('prefers the text/plain part and keeps the first occurrence of each header', () => {
    const message = parseRawMessage({
      id: 'mp',
      threadId: 'tp',
      labelIds: ['INBOX'],
      snippet: 'Plain',
      payload: {
        mimeType: 'multipart/alternative',
        headers: [
          { name: 'Subject', value: 'First' },
          { name: 'subject', value: 'Second' },
          { name: 'X-Custom', value: 'yes' },
        ],
        parts: [
          { mimeType: 'text/html', body: { data: encodeBase64Url('<p>Rich</p>') } },
          { mimeType: 'text/plain', body: { data: encodeBase64Url('Plain body\n') } },
        ],
      },
    })

    expect(message).toEqual({
      id: 'mp',
      threadId: 'tp',
      labelIds: ['INBOX'],
      headers: { Subject: 'First', 'X-Custom': 'yes' },
      body: 'Plain body',
      snippet: 'Plain',
    })
    expect(getHeader(message, 'x-custom')).toBe('yes')
    expect(getHeader(message, 'cc')).toBeUndefined()
  })

  test('renders HTML-only bodies as markdown', () => {
    const message = parseRawMessage({
      id: 'mh',
      payload: {
        mimeType: 'multipart/alternative',
        parts: [{ mimeType: 'text/html', body: { data: encodeBase64Url('<p>Hello <b>there</b></p>') } }],
      },
    })
    expect(message.body).toBe('Hello **there**')
  })
})

describe('credential handling', () => {
  test('an expired credential is refreshed once and persisted', async () => {
    store.save(makeCredential({ expiry: new Date('2026-03-01T09:00:00.000Z') }))
    const client = createClient()

    const message = await client.getMessage('m1')

    expect(message).not.toBeInstanceOf(Error)
    expect(oauth.refreshCalls).toBe(1)
    expect(transport.tokensSeen).toEqual(['test-refreshed-access-1'])
    expect(store.load()).toEqual(
      makeCredential({ accessToken: 'test-refreshed-access-1', expiry: new Date('2031-01-01T00:00:00.000Z') }),
    )
  })

  test('a credential inside the refresh skew is refreshed ahead of expiry', async () => {
    store.save(makeCredential({ expiry: new Date('2026-03-01T10:00:30.000Z') }))
    await createClient().getMessage('m1')
    expect(oauth.refreshCalls).toBe(1)
  })

  test('concurrent calls share a single refresh', async () => {
    store.save(makeCredential({ expiry: new Date('2026-03-01T09:00:00.000Z') }))
    const client = createClient()

    await Promise.all([client.getMessage('m1'), client.getMessage('m1'), client.listMessages('in:inbox')])

    expect(oauth.refreshCalls).toBe(1)
  })

  test('a valid credential is used as-is', async () => {
    store.save(makeCredential())
    await createClient().getMessage('m1')
    expect(oauth.refreshCalls).toBe(0)
    expect(transport.tokensSeen).toEqual(['test-access-token'])
  })

  test('a revoked refresh token clears the store and fails without retry', async () => {
    store.save(makeCredential({ expiry: new Date('2026-03-01T09:00:00.000Z') }))
    oauth.revoked = true

    const result = await createClient().getMessage('m1')

    expect(result).toBeInstanceOf(AuthError)
    expect(oauth.refreshCalls).toBe(1)
    expect(transport.calls.getMessage).toBe(0)
    expect(store.load()).toBeNull()
  })

  test('a 401 refreshes once and retries the call exactly once', async () => {
    store.save(makeCredential())
    transport.rejectedTokens.add('test-access-token')

    const message = await createClient().getMessage('m1')

    expect(message).not.toBeInstanceOf(Error)
    expect(oauth.refreshCalls).toBe(1)
    expect(transport.tokensSeen).toEqual(['test-access-token', 'test-refreshed-access-1'])
  })

  test('a 401 after the refresh surfaces as AuthError', async () => {
    store.save(makeCredential())
    transport.rejectedTokens.add('test-access-token')
    transport.rejectedTokens.add('test-refreshed-access-1')

    const result = await createClient().getMessage('m1')

    expect(result).toBeInstanceOf(AuthError)
    expect(transport.calls.getMessage).toBe(2)
  })

  test('without a credential or a flow, calls fail with AuthError', async () => {
    const client = createClient()
    expect(client.canReauthorize).toBe(false)
    expect(await client.getMessage('m1')).toBeInstanceOf(AuthError)
    expect(transport.calls.getMessage).toBe(0)
  })

  test('without a credential, a configured flow is run and its result saved', async () => {
    let obtained = 0
    const client = createClient({
      flow: {
        obtain: async () => {
          obtained++
          return makeCredential({ accessToken: 'test-consented-access' })
        },
      },
    })

    await client.getMessage('m1')

    expect(obtained).toBe(1)
    expect(transport.tokensSeen).toEqual(['test-consented-access'])
    expect(store.load()).toEqual(makeCredential({ accessToken: 'test-consented-access' }))
  })
})

describe('remote failures', () => {
  beforeEach(() => {
    store.save(makeCredential())
  })

  test('a missing message is NotFoundError', async () => {
    const result = await createClient().getMessage('gone')
    expect(result).toBeInstanceOf(NotFoundError)
    expect(transport.calls.getMessage).toBe(1)
  })

  test('persistent 503s stop after five attempts with non-decreasing delays', async () => {
    transport.failWith('getMessage', httpError(503, 'Backend Error'), Infinity)

    const result = await createClient().getMessage('m1')

    expect(result).toBeInstanceOf(UnavailableError)
    expect(result instanceof Error && result.message).toBe('messages.get unavailable after 5 attempts: Backend Error')
    expect(transport.calls.getMessage).toBe(5)
    expect(delays).toEqual([1000, 2000, 4000, 8000])
  })

  test('maxAttempts is configurable', async () => {
    transport.failWith('listMessages', httpError(429, 'Rate Limit Exceeded'), Infinity)
    const result = await createClient({ retry: { maxAttempts: 2, sleep: async () => {} } }).listMessages('in:inbox')
    expect(result).toBeInstanceOf(UnavailableError)
    expect(transport.calls.listMessages).toBe(2)
  })

  test('a rate limit that clears is invisible to the caller', async () => {
    transport.failWith('getMessage', httpError(429, 'Rate Limit Exceeded'), 2)
    const result = await createClient().getMessage('m1')
    expect(result).not.toBeInstanceOf(Error)
    expect(transport.calls.getMessage).toBe(3)
  })
})

describe('listMessages', () => {
  test('returns one page and a token to resume from', async () => {
    store.save(makeCredential())
    transport.messages.set('m2', rawMessage({ id: 'm2' }))
    transport.messages.set('m3', rawMessage({ id: 'm3' }))
    const client = createClient({ maxResults: 2 })

    const first = await client.listMessages('in:inbox')
    expect(first).toEqual({ ids: ['m1', 'm2'], nextPageToken: '2' })

    const second = await client.listMessages('in:inbox', { pageToken: '2' })
    expect(second).toEqual({ ids: ['m3'], nextPageToken: undefined })
  })
})

describe('applyAction', () => {
  let client: GmailClient

  beforeEach(async () => {
    store.save(makeCredential())
    client = createClient()
  })

  async function message(id = 'm1') {
    const m = await client.getMessage(id)
    if (m instanceof Error) throw m
    return m
  }

  test('noop makes no remote call', async () => {
    const m = await message()
    expect(await client.applyAction(m, { type: 'noop' })).toEqual({ status: 'noop' })
    expect(transport.mutationCount).toBe(0)
  })

  test('archive removes INBOX in one modify', async () => {
    const m = await message()
    expect(await client.applyAction(m, { type: 'archive' })).toEqual({ status: 'applied', remoteId: 'm1' })
    expect(transport.modified).toEqual([{ id: 'm1', removeLabelIds: ['INBOX'] }])
  })

  test('label resolves names once and creates missing labels', async () => {
    transport.labels = [{ id: 'Label_7', name: 'Receipts' }]
    const m = await message()

    await client.applyAction(m, { type: 'label', label: 'receipts' })
    await client.applyAction(m, { type: 'label', label: 'Follow up' })
    await client.applyAction(m, { type: 'label', label: 'Follow up' })

    expect(transport.modified).toEqual([
      { id: 'm1', addLabelIds: ['Label_7'] },
      { id: 'm1', addLabelIds: ['Label_2'] },
      { id: 'm1', addLabelIds: ['Label_2'] },
    ])
    expect(transport.calls.listLabels).toBe(1)
    expect(transport.calls.createLabel).toBe(1)
  })

  test('reply sends one message in the thread with reply headers', async () => {
    transport.messages.set(
      'm4',
      rawMessage({
        id: 'm4',
        threadId: 't4',
        headers: [
          { name: 'Reply-To', value: 'Team <team@example.com>' },
          { name: 'References', value: '<root@mail.example.com>' },
        ],
      }),
    )
    const m = await message('m4')

    const result = await client.applyAction(m, { type: 'reply', body: 'thanks' })

    expect(result).toEqual({ status: 'applied', remoteId: 'sent-1' })
    expect(transport.sent).toHaveLength(1)
    expect(transport.sent[0]?.threadId).toBe('t4')
    const raw = decodeRaw(transport.sent[0]?.raw ?? '')
    expect(raw).toMatch(/^In-Reply-To: <m4@mail\.example\.com>\r?$/m)
    expect(raw).toMatch(/^References: <root@mail\.example\.com> <m4@mail\.example\.com>\r?$/m)
    expect(raw).toMatch(/^message-id: <[0-9a-f]{32}@mailwright\.local>\r?$/im)
    expect(raw).toContain('team@example.com')
    expect(raw).not.toContain('alice@example.com')
  })

  test('draft creates one draft and sends nothing', async () => {
    const m = await message()
    const result = await client.applyAction(m, { type: 'draft', body: 'thanks' })
    expect(result).toEqual({ status: 'applied', remoteId: 'draft-1' })
    expect(transport.calls.createDraft).toBe(1)
    expect(transport.calls.sendMessage).toBe(0)
    expect(transport.drafts[0]?.threadId).toBe('t1')
  })

  test('forward quotes the original outside the thread', async () => {
    const m = await message()
    await client.applyAction(m, { type: 'forward', to: 'assistant@example.com' })

    expect(transport.sent).toHaveLength(1)
    expect(transport.sent[0]?.threadId).toBeUndefined()
    const raw = decodeRaw(transport.sent[0]?.raw ?? '')
    expect(raw).toContain('assistant@example.com')
    expect(raw).toContain('---------- Forwarded message ----------')
  })

  test('forward refuses a target that would add headers', async () => {
    const m = await message()
    const result = await client.applyAction(m, { type: 'forward', to: 'a@example.com\r\nBcc: someone@example.com' })

    expect(result).toBeInstanceOf(ApiError)
    expect(transport.calls.sendMessage).toBe(0)
  })

  test('with verifyPrior, a reply that already landed is not sent again', async () => {
    const m = await message()

    await client.applyAction(m, { type: 'reply', body: 'thanks' })
    const retried = await client.applyAction(m, { type: 'reply', body: 'thanks' }, { verifyPrior: true })

    expect(retried).toEqual({ status: 'already-applied' })
    expect(transport.calls.sendMessage).toBe(1)
  })

  test('with verifyPrior and nothing sent yet, the reply goes out', async () => {
    const m = await message()
    const result = await client.applyAction(m, { type: 'reply', body: 'thanks' }, { verifyPrior: true })
    expect(result).toEqual({ status: 'applied', remoteId: 'sent-1' })
    expect(transport.calls.sendMessage).toBe(1)
  })
})

describe('outgoingMessageId', () => {
  test('is stable per message and action kind', () => {
    expect(outgoingMessageId('m1', 'reply')).toBe(outgoingMessageId('m1', 'reply'))
    expect(outgoingMessageId('m1', 'reply')).not.toBe(outgoingMessageId('m1', 'forward'))
    expect(outgoingMessageId('m1', 'reply')).toMatch(/^<[0-9a-f]{32}@mailwright\.local>$/)
  })
})

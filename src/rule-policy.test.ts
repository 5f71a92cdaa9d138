// Tests for rule matching with client-side Gmail search operators.

import fs from 'node:fs'
import path from 'node:path'
import { describe, expect, test } from 'vitest'
import { ConfigError } from './api-utils.js'
import { parseRawMessage } from './gmail-client.js'
import { RuleBasedPolicy, loadRules, parseQueryTerms } from './rule-policy.js'
import { rawMessage, tempDir } from './test-utils.js'

const receipt = parseRawMessage(
  rawMessage({ id: 'r1', from: 'Shop <billing@shop.example>', subject: 'Your receipt #42', body: 'Thanks for your order' }),
)
const question = parseRawMessage(
  rawMessage({ id: 'q1', from: 'Bob <bob@example.com>', subject: 'Quick question', body: 'Can we meet Friday?', labelIds: ['INBOX'] }),
)

describe('parseQueryTerms', () => {
  test('splits operators, quoted phrases and negations', () => {
    expect(parseQueryTerms('from:Bob subject:"quick question" -is:unread hello has:attachment')).toEqual([
      { operator: 'from', value: 'bob', negated: false },
      { operator: 'subject', value: 'quick question', negated: false },
      { operator: 'is', value: 'unread', negated: true },
      { operator: null, value: 'hello', negated: false },
      { operator: null, value: 'has:attachment', negated: false },
    ])
  })
})

describe('RuleBasedPolicy', () => {
  const policy = new RuleBasedPolicy([
    { match: 'from:billing subject:receipt', action: { type: 'label', label: 'Receipts' } },
    { match: 'subject:"quick question" -is:unread', action: { type: 'reply', body: 'Friday works.' } },
    { match: 'from:bob', action: { type: 'archive' } },
  ])

  test('first matching rule wins', () => {
    expect(policy.decide(receipt)).toEqual({ type: 'label', label: 'Receipts' })
    expect(policy.decide(question)).toEqual({ type: 'reply', body: 'Friday works.' })
  })

  test('negation excludes unread messages', () => {
    const unread = parseRawMessage(rawMessage({ id: 'q2', from: 'Bob <bob@example.com>', subject: 'Quick question' }))
    expect(policy.decide(unread)).toEqual({ type: 'archive' })
  })

  test('no match is a noop', () => {
    const other = parseRawMessage(rawMessage({ id: 'x', from: 'carol@example.com', subject: 'Lunch' }))
    expect(policy.decide(other)).toEqual({ type: 'noop' })
  })

  test('plain text matches the snippet', () => {
    const byText = new RuleBasedPolicy([{ match: 'friday', action: { type: 'forward', to: 'assistant@example.com' } }])
    expect(byText.decide(question)).toEqual({ type: 'forward', to: 'assistant@example.com' })
  })

  test('label: matches label ids case-insensitively', () => {
    const byLabel = new RuleBasedPolicy([{ match: 'label:inbox', action: { type: 'archive' } }])
    expect(byLabel.decide(question)).toEqual({ type: 'archive' })
  })
})

describe('loadRules', () => {
  test('reads rules from a JSON file', () => {
    const file = path.join(tempDir(), 'rules.json')
    fs.writeFileSync(file, JSON.stringify({ rules: [{ match: 'from:bob', action: { type: 'archive' } }] }))

    const policy = loadRules(file)
    if (policy instanceof Error) throw policy
    expect(policy.decide(question)).toEqual({ type: 'archive' })
  })

  test('rejects unknown action types', () => {
    const file = path.join(tempDir(), 'rules.json')
    fs.writeFileSync(file, JSON.stringify({ rules: [{ match: '', action: { type: 'delete' } }] }))
    expect(loadRules(file)).toBeInstanceOf(ConfigError)
  })

  test('rejects a missing file', () => {
    expect(loadRules(path.join(tempDir(), 'missing.json'))).toBeInstanceOf(ConfigError)
  })
})

// Rule-based decision policy.
// Rules are an ordered list of { match, action }; the first rule whose match
// expression fits the message wins, otherwise the message is left alone.
// Match expressions use Gmail search operators evaluated client-side:
// from:, to:, cc:, subject:, is:unread/read/starred, label:, and plain text
// (matches subject, sender and snippet). Terms are AND-ed together; quoted
// phrases and `-` negation are supported. An empty expression matches all.
// See https://support.google.com/mail/answer/7190 for the operator syntax.

import fs from 'node:fs'
import { z } from 'zod'
import { ConfigError } from './api-utils.js'
import { ActionSchema, NOOP, type Action, type DecisionPolicy } from './decision-policy.js'
import { getHeader, type Message } from './gmail-client.js'
import { addressMatches, parseAddresses, parseSender, type Address } from './email-utils.js'

export interface Rule {
  match: string
  action: Action
}

const RulesFileSchema = z.object({
  rules: z.array(z.object({ match: z.string(), action: ActionSchema })),
})

export class RuleBasedPolicy implements DecisionPolicy {
  readonly name = 'rules'
  private rules: Array<Rule & { terms: QueryTerm[] }>

  constructor(rules: Rule[]) {
    this.rules = rules.map((rule) => ({ ...rule, terms: parseQueryTerms(rule.match) }))
  }

  decide(message: Message): Action {
    const fields = toMatchable(message)
    const hit = this.rules.find((rule) => rule.terms.every((term) => matchesTerm(fields, term)))
    return hit?.action ?? NOOP
  }
}

export function loadRules(filePath: string): RuleBasedPolicy | ConfigError {
  let json: unknown
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (err) {
    return new ConfigError({ field: 'rules file', reason: `${filePath} could not be read as JSON`, cause: err })
  }

  const parsed = RulesFileSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return new ConfigError({
      field: 'rules file',
      reason: `${filePath}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? 'invalid'}`.trim(),
    })
  }
  return new RuleBasedPolicy(parsed.data.rules)
}

// ---------------------------------------------------------------------------
// Client-side Gmail query matching
// ---------------------------------------------------------------------------

interface MatchableMessage {
  subject: string
  snippet: string
  from: Address | null
  to: Address[]
  cc: Address[]
  labelIds: string[]
}

export interface QueryTerm {
  operator: 'from' | 'to' | 'cc' | 'subject' | 'is' | 'label' | null
  value: string
  negated: boolean
}

const SUPPORTED_OPERATORS = new Set(['from', 'to', 'cc', 'subject', 'is', 'label'])

function isSupportedOperator(op: string): op is NonNullable<QueryTerm['operator']> {
  return SUPPORTED_OPERATORS.has(op)
}

function toMatchable(message: Message): MatchableMessage {
  return {
    subject: getHeader(message, 'subject') ?? '',
    snippet: message.snippet,
    from: parseSender(getHeader(message, 'from')),
    to: parseAddresses(getHeader(message, 'to')),
    cc: parseAddresses(getHeader(message, 'cc')),
    labelIds: message.labelIds,
  }
}

/** Unknown operators are kept as plain text so a typo never widens a rule
 *  into matching everything. */
export function parseQueryTerms(query: string): QueryTerm[] {
  const terms: QueryTerm[] = []
  const regex = /(-?)(?:(\w+):)?(?:"([^"]*)"|(\S+))/g
  let match: RegExpExecArray | null

  while ((match = regex.exec(query)) !== null) {
    const negated = match[1] === '-'
    const rawOperator = match[2]?.toLowerCase() ?? null
    const value = (match[3] ?? match[4] ?? '').toLowerCase()
    if (!value) continue

    if (rawOperator && isSupportedOperator(rawOperator)) {
      terms.push({ operator: rawOperator, value, negated })
    } else if (rawOperator) {
      terms.push({ operator: null, value: `${rawOperator}:${value}`, negated })
    } else {
      terms.push({ operator: null, value, negated })
    }
  }

  return terms
}

function matchesTerm(msg: MatchableMessage, term: QueryTerm): boolean {
  let result: boolean

  switch (term.operator) {
    case 'from':
      result = msg.from !== null && addressMatches(msg.from, term.value)
      break
    case 'to':
      result = msg.to.some((r) => addressMatches(r, term.value))
      break
    case 'cc':
      result = msg.cc.some((r) => addressMatches(r, term.value))
      break
    case 'subject':
      result = msg.subject.toLowerCase().includes(term.value)
      break
    case 'is':
      if (term.value === 'unread') result = msg.labelIds.includes('UNREAD')
      else if (term.value === 'read') result = !msg.labelIds.includes('UNREAD')
      else if (term.value === 'starred') result = msg.labelIds.includes('STARRED')
      else result = false
      break
    case 'label':
      result = msg.labelIds.some((l) => l.toLowerCase() === term.value)
      break
    default: {
      const haystack = `${msg.subject} ${msg.from?.name ?? ''} ${msg.from?.email ?? ''} ${msg.snippet}`.toLowerCase()
      result = haystack.includes(term.value)
      break
    }
  }

  return term.negated ? !result : result
}

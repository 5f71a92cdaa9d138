// Model-backed decision policy.
// Two chat completions per message: classify the message into one of four
// response categories, then (unless no reply is needed) write the reply text.
// Talks to any OpenAI-compatible endpoint through the openai SDK; the default
// is Groq's llama-3.1-8b-instant. Temperature 0 keeps replays close to the
// first decision, and the orchestrator reuses a claimed action on resume.

import OpenAI from 'openai'
import { NOOP, type Action, type DecisionPolicy } from './decision-policy.js'
import { getHeader, type Message } from './gmail-client.js'

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1'
export const DEFAULT_MODEL = 'llama-3.1-8b-instant'

export const CATEGORIES = ['follow-up', 'thank you', 'information request', 'no reply needed'] as const
export type Category = (typeof CATEGORIES)[number]

export interface ChatCompleter {
  complete(params: { system: string; user: string }): Promise<string>
}

export interface OpenAIChatCompleterOptions {
  apiKey: string
  model?: string
  baseUrl?: string
  maxTokens?: number
}

export class OpenAIChatCompleter implements ChatCompleter {
  private client: OpenAI
  private model: string
  private maxTokens: number

  constructor(options: OpenAIChatCompleterOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl ?? GROQ_BASE_URL })
    this.model = options.model ?? DEFAULT_MODEL
    this.maxTokens = options.maxTokens ?? 1024
  }

  async complete({ system, user }: { system: string; user: string }): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
    })

    const content = response.choices[0]?.message?.content
    if (!content) throw new Error('No text content in model response')
    return content
  }
}

const CLASSIFY_PROMPT = [
  'You decide whether an email requires a reply.',
  "If it does, classify the response type as 'follow-up', 'thank you' or 'information request'.",
  "If it does not (promotions, confirmations, newsletters, receipts), answer 'no reply needed'.",
  'Answer with the category only.',
].join(' ')

const DRAFT_PROMPT = [
  'You write polite, professional, context-aware email replies.',
  'Return only the reply body: no subject line, no headers, no commentary.',
].join(' ')

/** Map free-form model output onto a category; unknown output is an error. */
export function parseCategory(output: string): Category {
  const text = output.toLowerCase()
  if (text.includes('no reply')) return 'no reply needed'
  if (text.includes('follow')) return 'follow-up'
  if (text.includes('thank')) return 'thank you'
  if (text.includes('information')) return 'information request'
  throw new Error(`unrecognized classification: ${output.trim().slice(0, 80)}`)
}

export class ModelPolicy implements DecisionPolicy {
  readonly name = 'model'
  private completer: ChatCompleter
  private replyMode: 'draft' | 'send'

  constructor({ completer, replyMode = 'draft' }: { completer: ChatCompleter; replyMode?: 'draft' | 'send' }) {
    this.completer = completer
    this.replyMode = replyMode
  }

  async decide(message: Message): Promise<Action> {
    const body = message.body.trim()
    if (!body) return NOOP

    const email = [
      `Subject: ${getHeader(message, 'subject') ?? ''}`,
      `From: ${getHeader(message, 'from') ?? ''}`,
      '',
      body,
    ].join('\n')

    const category = parseCategory(await this.completer.complete({ system: CLASSIFY_PROMPT, user: email }))
    if (category === 'no reply needed') return NOOP

    const reply = (
      await this.completer.complete({
        system: DRAFT_PROMPT,
        user: `${email}\n\nResponse type: ${category}. Write the reply.`,
      })
    ).trim()
    if (!reply) throw new Error('model returned an empty reply')

    return this.replyMode === 'send' ? { type: 'reply', body: reply } : { type: 'draft', body: reply }
  }
}

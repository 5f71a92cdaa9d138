// Decision policy contract: one Message in, exactly one Action out.
// Policies are external capabilities (rule tables, model-backed classifiers),
// so their output is validated here with zod before the orchestrator trusts it.
// A throw, a timeout, or anything that is not an Action becomes a PolicyError.

import { z } from 'zod'
import * as errore from 'errore'
import { PolicyError, describeError } from './api-utils.js'
import { isPlainAddress } from './email-utils.js'
import type { Message } from './gmail-client.js'

export const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('reply'), body: z.string().min(1) }),
  z.object({ type: z.literal('draft'), body: z.string().min(1) }),
  z.object({ type: z.literal('archive') }),
  z.object({ type: z.literal('label'), label: z.string().min(1) }),
  z.object({ type: z.literal('forward'), to: z.string().refine(isPlainAddress, 'must be a single email address') }),
  z.object({ type: z.literal('noop') }),
])

export type Action = z.infer<typeof ActionSchema>

export const NOOP: Action = { type: 'noop' }

export interface PolicyContext {
  /** Address of the mailbox being processed. */
  account: string
  now: Date
}

export interface DecisionPolicy {
  readonly name: string
  /** Must depend only on its arguments, so replays decide the same way. */
  decide(message: Message, context: PolicyContext): Action | Promise<Action>
}

export const DEFAULT_POLICY_TIMEOUT_MS = 60_000

/** Ask the policy for an action, bounded by `timeoutMs`. */
export async function decideAction(
  policy: DecisionPolicy,
  message: Message,
  context: PolicyContext,
  { timeoutMs = DEFAULT_POLICY_TIMEOUT_MS }: { timeoutMs?: number } = {},
): Promise<Action | PolicyError> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs)
  })

  const result = await errore.tryAsync({
    // then() turns a synchronous throw inside decide() into a rejection
    try: () => Promise.race([Promise.resolve().then(() => policy.decide(message, context)), timeout]),
    catch: (err) => new PolicyError({ messageId: message.id, reason: describeError(err), cause: err }),
  })
  clearTimeout(timer)
  if (result instanceof Error) return result

  const parsed = ActionSchema.safeParse(result)
  if (!parsed.success) {
    return new PolicyError({ messageId: message.id, reason: `${policy.name} returned something that is not an action` })
  }
  return parsed.data
}

/** Compact label for logs and ledger listings. */
export function describeAction(action: Action): string {
  switch (action.type) {
    case 'label':
      return `label(${action.label})`
    case 'forward':
      return `forward(${action.to})`
    default:
      return action.type
  }
}

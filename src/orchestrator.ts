// Poll → decide → apply → record loop.
// One cycle lists a single page of matching messages, drops ids the ledger
// already holds (and ids another task is still working on), fetches the rest
// concurrently, then handles them one at a time. Each message is committed to
// the ledger before the next one starts, so a crash loses at most the
// in-flight message; its ledger claim makes the retry a verified no-op.
//
// The stop signal is checked between messages only: an apply that has
// started always runs through to its ledger row or to a halting error.

import {
  backoffDelay,
  mapConcurrent,
  sleep,
  AuthError,
  ApiError,
  DuplicateEntryError,
  NotFoundError,
  PolicyError,
  UnavailableError,
} from './api-utils.js'
import {
  NOOP,
  DEFAULT_POLICY_TIMEOUT_MS,
  decideAction,
  describeAction,
  type Action,
  type DecisionPolicy,
} from './decision-policy.js'
import type { ClientError, GmailClient, Message } from './gmail-client.js'
import type { Outcome, ProcessedLedger } from './ledger.js'
import { hint, warn } from './output.js'

export type OrchestratorState =
  | 'idle'
  | 'polling'
  | 'deciding'
  | 'applying'
  | 'recording'
  | 'auth-required'
  | 'backoff'
  | 'stopped'

export interface MessageReport {
  messageId: string
  action: Action
  /** `already-handled`: another writer recorded the id first. */
  result: 'success' | 'failed' | 'already-handled'
  reason?: string
}

export interface CycleReport {
  listed: number
  skipped: number
  processed: MessageReport[]
  nextPageToken?: string
  /** The stop signal fired before every message was handled. */
  stopped: boolean
}

export interface RunSummary {
  cycles: number
  processed: number
}

export type HaltingError = ClientError | NotFoundError

export interface Logger {
  hint(msg: string): void
  warn(msg: string): void
}

/** A message whose fetch failed with a non-transient API error. */
interface UnreadableMessage {
  id: string
  error: ApiError
}

const FETCH_CONCURRENCY = 5
const BACKOFF_BASE_MS = 5_000
const BACKOFF_MAX_MS = 5 * 60_000

export class Orchestrator {
  private client: GmailClient
  private ledger: ProcessedLedger
  private policy: DecisionPolicy
  private query: string
  private policyTimeoutMs: number
  private now: () => Date
  private logger: Logger
  private onStateChange: ((state: OrchestratorState) => void) | undefined
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private random: () => number
  private inFlight = new Set<string>()
  private account: string | null = null
  private _state: OrchestratorState = 'idle'

  constructor({
    client,
    ledger,
    policy,
    query,
    policyTimeoutMs = DEFAULT_POLICY_TIMEOUT_MS,
    now = () => new Date(),
    logger = { hint, warn },
    onStateChange,
    sleep: sleepFn = sleep,
    random = Math.random,
  }: {
    client: GmailClient
    ledger: ProcessedLedger
    policy: DecisionPolicy
    query: string
    policyTimeoutMs?: number
    now?: () => Date
    logger?: Logger
    onStateChange?: (state: OrchestratorState) => void
    /** Waits between cycles and during backoff; must return early on abort. */
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
    /** Jitter source for cycle backoff. */
    random?: () => number
  }) {
    this.client = client
    this.ledger = ledger
    this.policy = policy
    this.query = query
    this.policyTimeoutMs = policyTimeoutMs
    this.now = now
    this.logger = logger
    this.onStateChange = onStateChange
    this.sleep = sleepFn
    this.random = random
  }

  get state(): OrchestratorState {
    return this._state
  }

  private setState(state: OrchestratorState) {
    if (this._state === state) return
    this._state = state
    this.onStateChange?.(state)
  }

  // =========================================================================
  // One cycle
  // =========================================================================

  async runCycle({
    pageToken,
    signal,
  }: { pageToken?: string; signal?: AbortSignal } = {}): Promise<CycleReport | HaltingError> {
    this.setState('polling')
    const page = await this.client.listMessages(this.query, { pageToken })
    if (page instanceof Error) return this.halt(page)

    const ids = this.ledger.listUnprocessed(page.ids).filter((id) => !this.inFlight.has(id))
    const report: CycleReport = {
      listed: page.ids.length,
      skipped: page.ids.length - ids.length,
      processed: [],
      nextPageToken: page.nextPageToken,
      stopped: false,
    }
    if (ids.length === 0) {
      this.setState('idle')
      return report
    }

    const fetched = await mapConcurrent(
      ids,
      async (id): Promise<Message | UnreadableMessage | null | HaltingError> => {
        const message = await this.client.getMessage(id)
        if (message instanceof NotFoundError) {
          this.logger.warn(`Message ${id} vanished before it could be read; skipping`)
          return null
        }
        if (message instanceof ApiError) return { id, error: message }
        return message
      },
      FETCH_CONCURRENCY,
    )
    if (fetched instanceof Error) return this.halt(fetched)

    const messages = fetched.filter((m): m is Message | UnreadableMessage => m !== null)
    report.skipped += ids.length - messages.length

    for (const message of messages) {
      if (signal?.aborted) {
        report.stopped = true
        break
      }
      if (this.inFlight.has(message.id)) continue

      if ('error' in message) {
        // Recorded as failed: later cycles skip it like any handled id
        this.logger.warn(`${message.error.message}; recording ${message.id} as failed`)
        report.processed.push(this.commit(message.id, NOOP, { status: 'failed', reason: 'api_error' }))
        continue
      }

      this.inFlight.add(message.id)
      try {
        const handled = await this.handleMessage(message)
        if (handled instanceof Error) return this.halt(handled)
        report.processed.push(handled)
      } finally {
        this.inFlight.delete(message.id)
      }
    }

    this.setState('idle')
    return report
  }

  private halt<E extends Error>(err: E): E {
    this.setState('idle')
    return err
  }

  private async handleMessage(message: Message): Promise<MessageReport | HaltingError> {
    const claim = this.ledger.getClaim(message.id)
    if (claim instanceof Error) return claim

    let action: Action
    if (claim) {
      // An earlier run claimed this message and may already have applied it
      action = claim.action
      this.logger.hint(`Resuming ${message.id} with claimed action ${describeAction(action)}`)
    } else {
      this.setState('deciding')
      const account = await this.currentAccount()
      if (account instanceof Error) return account

      const decided = await decideAction(this.policy, message, { account, now: this.now() }, { timeoutMs: this.policyTimeoutMs })
      if (decided instanceof PolicyError) {
        this.logger.warn(decided.message)
        return this.commit(message.id, NOOP, { status: 'failed', reason: 'policy_error' })
      }
      action = decided
      this.ledger.claim(message.id, action, this.now())
    }

    this.setState('applying')
    const applied = await this.client.applyAction(message, action, { verifyPrior: claim !== null })

    let outcome: Outcome = { status: 'success' }
    if (applied instanceof NotFoundError) {
      outcome = { status: 'failed', reason: 'not_found' }
    } else if (applied instanceof ApiError) {
      this.logger.warn(applied.message)
      outcome = { status: 'failed', reason: 'api_error' }
    } else if (applied instanceof Error) {
      // Claim stays in place: the next cycle verifies before re-applying
      return applied
    } else if (applied.status === 'already-applied') {
      this.logger.hint(`${describeAction(action)} for ${message.id} had already reached Gmail`)
    }

    return this.commit(message.id, action, outcome)
  }

  private commit(messageId: string, action: Action, outcome: Outcome): MessageReport {
    this.setState('recording')
    const recorded = this.ledger.record({ messageId, action, appliedAt: this.now(), outcome })
    if (recorded instanceof DuplicateEntryError) {
      return { messageId, action, result: 'already-handled' }
    }
    return outcome.status === 'success'
      ? { messageId, action, result: 'success' }
      : { messageId, action, result: 'failed', reason: outcome.reason }
  }

  private async currentAccount(): Promise<string | HaltingError> {
    if (this.account !== null) return this.account
    const profile = await this.client.getProfile()
    if (profile instanceof Error) return profile
    this.account = profile.emailAddress
    return this.account
  }

  // =========================================================================
  // Loop
  // =========================================================================

  /** Repeat cycles until the signal aborts (or once). Returns the error that
   *  halted the loop, if any. */
  async run({
    signal,
    intervalMs,
    once = false,
    onCycle,
  }: {
    signal: AbortSignal
    intervalMs: number
    once?: boolean
    onCycle?: (report: CycleReport) => void
  }): Promise<RunSummary | HaltingError> {
    const summary: RunSummary = { cycles: 0, processed: 0 }
    let pageToken: string | undefined
    let consecutiveFailures = 0
    let reauthorized = false

    while (!signal.aborted) {
      const report = await this.runCycle({ pageToken, signal })

      if (report instanceof UnavailableError) {
        consecutiveFailures++
        if (once) return report
        this.setState('backoff')
        const delayMs = backoffDelay(consecutiveFailures, {
          baseDelayMs: BACKOFF_BASE_MS,
          maxDelayMs: BACKOFF_MAX_MS,
          random: this.random,
        })
        this.logger.warn(`${report.message}; backing off ${Math.round(delayMs / 1000)}s`)
        await this.sleep(delayMs, signal)
        this.setState('idle')
        continue
      }

      if (report instanceof AuthError) {
        // A fresh consent that is rejected again needs the operator
        if (!this.client.canReauthorize || reauthorized) return report
        this.setState('auth-required')
        this.logger.warn(`${report.message}; re-authorization required`)
        const credential = await this.client.reauthorize()
        if (credential instanceof Error) return credential
        reauthorized = true
        this.account = null
        continue
      }

      // Corrupt store, declined consent, non-transient API failure
      if (report instanceof Error) return report

      summary.cycles++
      summary.processed += report.processed.length
      consecutiveFailures = 0
      reauthorized = false
      pageToken = report.nextPageToken
      onCycle?.(report)

      if (once || report.stopped) break
      await this.sleep(intervalMs, signal)
    }

    this.setState('stopped')
    return summary
  }
}

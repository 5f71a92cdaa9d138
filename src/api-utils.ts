// Shared API utilities for the Gmail client, auth flow and orchestrator.
// Retry with exponential backoff for transient errors, bounded concurrency
// helper, abortable sleep, and the tagged error taxonomy.
//
// Error handling follows the errore pattern (errors as values):
// - Clients, stores and the ledger return tagged errors instead of throwing
// - Callers narrow with instanceof, no try/catch or string matching needed
// - See https://errore.org/ for the philosophy

import * as errore from 'errore'

const MAX_CONCURRENCY = 10

/** Exclude Error subtypes from a union. Used by mapConcurrent to strip
 *  error return types from the success array — errors are returned separately. */
type ExcludeError<T> = T extends Error ? never : T

/** Extract Error subtypes from a union. Used by mapConcurrent for the error branch. */
type ExtractError<T> = T extends Error ? T : never

/** Run promises with bounded concurrency.
 *  Error-aware: if any callback returns an Error instance, remaining work is
 *  aborted and that error is returned as a value (no throwing needed).
 *  Callbacks should return Error for fatal failures (auth) and null for skip. */
export async function mapConcurrent<T, R>(
  items: T[],
  fn: (item: T) => Promise<R>,
  concurrency = MAX_CONCURRENCY,
): Promise<ExcludeError<R>[] | ExtractError<R>> {
  const results: ExcludeError<R>[] = []
  let index = 0
  let fatalError: Error | null = null

  async function worker() {
    while (index < items.length && !fatalError) {
      const i = index++
      const result = await fn(items[i]!)
      if (result instanceof Error) {
        fatalError = result
        return
      }
      results[i] = result as ExcludeError<R>
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker())
  await Promise.all(workers)
  if (fatalError) return fatalError as ExtractError<R>
  return results
}

// ---------------------------------------------------------------------------
// Retry with exponential backoff
// ---------------------------------------------------------------------------

export interface RetryOptions {
  /** Total attempts, including the first call. */
  maxAttempts?: number
  baseDelayMs?: number
  maxDelayMs?: number
  /** Source of jitter in [0, 1). */
  random?: () => number
  sleep?: (ms: number) => Promise<void>
  shouldRetry?: (err: unknown) => boolean
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void
}

export const DEFAULT_RETRY = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
} as const

/** Delay before retry number `attempt` (1-based). Jitter adds at most half of
 *  the exponential step, so the sequence never decreases: step n tops out at
 *  1.5 * base * 2^(n-1), which is below step n+1's floor of 2 * base * 2^(n-1). */
export function backoffDelay(
  attempt: number,
  { baseDelayMs = DEFAULT_RETRY.baseDelayMs, maxDelayMs = DEFAULT_RETRY.maxDelayMs, random = Math.random }: RetryOptions = {},
): number {
  const step = baseDelayMs * Math.pow(2, attempt - 1)
  const jitter = step * 0.5 * random()
  return Math.min(maxDelayMs, Math.round(step + jitter))
}

/** Retry `fn` on transient errors (rate limits, 5xx, network resets).
 *  Non-transient errors are rethrown immediately; the last transient error is
 *  rethrown once attempts run out. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY.maxAttempts
  const shouldRetry = options.shouldRetry ?? isTransientError
  const sleepFn = options.sleep ?? sleep

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (!shouldRetry(err) || attempt >= maxAttempts) throw err
      const delayMs = backoffDelay(attempt, options)
      options.onRetry?.({ attempt, delayMs, error: err })
      await sleepFn(delayMs)
    }
  }
}

/** Sleep that resolves early when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve()
    const timer = setTimeout(done, ms)
    function done() {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    signal?.addEventListener('abort', done, { once: true })
  })
}

// ---------------------------------------------------------------------------
// Tagged errors (errore pattern: errors as values, not exceptions)
// ---------------------------------------------------------------------------

/** Authentication failed: declined, revoked, or rejected credential.
 *  Surfaced to the operator; never retried with the stale credential. */
export class AuthError extends errore.createTaggedError({
  name: 'AuthError',
  message: 'Authentication failed: $reason',
}) {}

/** The user denied the consent screen. */
export class UserDeclinedError extends errore.createTaggedError({
  name: 'UserDeclinedError',
  message: 'Authorization declined: $reason',
}) {}

/** No consent response arrived before the flow timeout. */
export class FlowTimeoutError extends errore.createTaggedError({
  name: 'FlowTimeoutError',
  message: 'Authorization timed out after $seconds seconds',
}) {}

/** A persisted store (credential file, ledger row) cannot be parsed. */
export class CorruptStoreError extends errore.createTaggedError({
  name: 'CorruptStoreError',
  message: 'Corrupt $store at $path: $reason',
}) {}

/** Returned when a requested resource doesn't exist (message deleted, label gone). */
export class NotFoundError extends errore.createTaggedError({
  name: 'NotFoundError',
  message: '$resource not found',
}) {}

/** Transient remote failures persisted through every retry attempt. */
export class UnavailableError extends errore.createTaggedError({
  name: 'UnavailableError',
  message: '$operation unavailable after $attempts attempts: $reason',
}) {}

/** Returned when a non-auth, non-transient API call fails. */
export class ApiError extends errore.createTaggedError({
  name: 'ApiError',
  message: 'API call failed: $reason',
}) {}

/** The ledger already holds an entry for this message id. */
export class DuplicateEntryError extends errore.createTaggedError({
  name: 'DuplicateEntryError',
  message: 'Ledger entry already exists for message $messageId',
}) {}

/** The decision policy threw, timed out, or returned something that is not an Action. */
export class PolicyError extends errore.createTaggedError({
  name: 'PolicyError',
  message: 'Decision policy failed for message $messageId: $reason',
}) {}

/** Missing or invalid configuration, reported before the loop starts. */
export class ConfigError extends errore.createTaggedError({
  name: 'ConfigError',
  message: 'Invalid configuration $field: $reason',
}) {}

// ---------------------------------------------------------------------------
// Error classification (boundary layer for untyped library exceptions)
// ---------------------------------------------------------------------------

interface ErrorShape {
  code?: unknown
  status?: unknown
  errors?: unknown
  response?: { status?: unknown; data?: unknown }
}

function shapeOf(err: unknown): ErrorShape {
  return typeof err === 'object' && err !== null ? (err as ErrorShape) : {}
}

/** HTTP status carried by a gaxios / googleapis error, if any. */
export function statusOf(err: unknown): number | undefined {
  const e = shapeOf(err)
  for (const candidate of [e.code, e.status, e.response?.status]) {
    if (typeof candidate === 'number') return candidate
    if (typeof candidate === 'string' && /^\d{3}$/.test(candidate)) return Number(candidate)
  }
  return undefined
}

function errorReasons(err: unknown): string[] {
  const e = shapeOf(err)
  const data = e.response?.data
  const nested =
    typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'object' && data.error !== null && 'errors' in data.error
      ? data.error.errors
      : undefined
  const list = Array.isArray(e.errors) ? e.errors : Array.isArray(nested) ? nested : []
  return list
    .map((item: unknown) => (typeof item === 'object' && item !== null && 'reason' in item ? String(item.reason) : ''))
    .filter(Boolean)
}

const RATE_LIMIT_REASONS = new Set([
  'userRateLimitExceeded',
  'rateLimitExceeded',
  'quotaExceeded',
  'dailyLimitExceeded',
  'limitExceeded',
  'backendError',
])

const NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'ENOTFOUND', 'EPIPE', 'ECONNABORTED'])

export function isRateLimitError(err: unknown): boolean {
  const status = statusOf(err)
  if (status === 429) return true
  if (status === 403) return errorReasons(err).some((r) => RATE_LIMIT_REASONS.has(r))
  return false
}

/** Rate limits, 5xx responses and network-level failures. */
export function isTransientError(err: unknown): boolean {
  if (isRateLimitError(err)) return true
  const status = statusOf(err)
  if (status !== undefined && status >= 500 && status <= 599) return true
  const code = shapeOf(err).code
  return typeof code === 'string' && NETWORK_CODES.has(code)
}

/** Detect auth-like errors from googleapis / google-auth-library.
 *  String matching is the boundary that turns untyped library exceptions
 *  into typed AuthError values. */
export function isAuthLikeError(err: unknown): boolean {
  const status = statusOf(err)
  if (status === 401) return true
  if (status === 403 && !isRateLimitError(err)) return true
  const msg = String(err)
  return msg.includes('Invalid Credentials') || msg.includes('Invalid credentials') || msg.includes('Unauthorized')
}

/** Google answers a refresh with `invalid_grant` once the refresh token is
 *  revoked or expired; that is final, never transient. */
export function isRevocationError(err: unknown): boolean {
  const data = shapeOf(err).response?.data
  if (typeof data === 'object' && data !== null && 'error' in data && data.error === 'invalid_grant') return true
  return String(err).includes('invalid_grant')
}

export function isNotFoundError(err: unknown): boolean {
  return statusOf(err) === 404
}

/** Short description of an unknown thrown value, for error reasons. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

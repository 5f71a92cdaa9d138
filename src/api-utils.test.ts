// Tests for retry/backoff, error classification and mapConcurrent.

import { describe, expect, test } from 'vitest'
import {
  backoffDelay,
  isRevocationError,
  isTransientError,
  mapConcurrent,
  withRetry,
  NotFoundError,
} from './api-utils.js'
import { httpError } from './test-utils.js'

describe('backoffDelay', () => {
  test('doubles the step and adds at most half a step of jitter', () => {
    expect(backoffDelay(1, { random: () => 0 })).toBe(1000)
    expect(backoffDelay(2, { random: () => 0 })).toBe(2000)
    expect(backoffDelay(3, { random: () => 0.5 })).toBe(5000)
  })

  test('never decreases, even with worst-case jitter', () => {
    for (let attempt = 1; attempt < 12; attempt++) {
      const highest = backoffDelay(attempt, { random: () => 0.999 })
      const lowest = backoffDelay(attempt + 1, { random: () => 0 })
      expect(lowest).toBeGreaterThanOrEqual(highest)
    }
  })

  test('is capped at maxDelayMs', () => {
    expect(backoffDelay(10, { random: () => 0 })).toBe(60_000)
    expect(backoffDelay(4, { baseDelayMs: 100, maxDelayMs: 500, random: () => 0 })).toBe(500)
  })
})

describe('withRetry', () => {
  test('stops after maxAttempts total calls on a persistent transient error', async () => {
    const delays: number[] = []
    let calls = 0
    const failure = httpError(503, 'Backend Error')

    await expect(
      withRetry(
        async () => {
          calls++
          throw failure
        },
        { sleep: async (ms) => void delays.push(ms), random: () => 0.7 },
      ),
    ).rejects.toBe(failure)

    expect(calls).toBe(5)
    expect(delays).toEqual([1350, 2700, 5400, 10800])
  })

  test('rethrows non-transient errors without retrying', async () => {
    let calls = 0
    const failure = httpError(400, 'Bad Request')
    await expect(
      withRetry(async () => {
        calls++
        throw failure
      }, { sleep: async () => {} }),
    ).rejects.toBe(failure)
    expect(calls).toBe(1)
  })

  test('returns the first successful result', async () => {
    let calls = 0
    const result = await withRetry(
      async () => {
        calls++
        if (calls < 3) throw httpError(429, 'Too Many Requests')
        return 'ok'
      },
      { sleep: async () => {} },
    )
    expect(result).toBe('ok')
    expect(calls).toBe(3)
  })
})

describe('error classification', () => {
  test('transient errors', () => {
    expect(isTransientError(httpError(429, 'rate'))).toBe(true)
    expect(isTransientError(httpError(500, 'server'))).toBe(true)
    expect(isTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true)
    expect(isTransientError(Object.assign(httpError(403, 'quota'), { errors: [{ reason: 'rateLimitExceeded' }] }))).toBe(true)
    expect(isTransientError(httpError(403, 'Forbidden'))).toBe(false)
    expect(isTransientError(httpError(404, 'Not Found'))).toBe(false)
  })

  test('revocation is recognised from the token endpoint body', () => {
    expect(isRevocationError(httpError(400, 'Bad Request', { error: 'invalid_grant' }))).toBe(true)
    expect(isRevocationError(httpError(400, 'Bad Request', { error: 'invalid_request' }))).toBe(false)
  })
})

describe('mapConcurrent', () => {
  test('keeps input order', async () => {
    const result = await mapConcurrent([30, 10, 20], async (ms) => {
      await new Promise((resolve) => setTimeout(resolve, ms))
      return ms * 2
    }, 3)
    expect(result).toEqual([60, 20, 40])
  })

  test('returns the first error value', async () => {
    const result = await mapConcurrent(['a', 'b', 'c'], async (id) => {
      if (id === 'b') return new NotFoundError({ resource: `Message ${id}` })
      return id
    }, 1)
    expect(result).toBeInstanceOf(NotFoundError)
  })
})

// Tests for the file-backed credential store.

import fs from 'node:fs'
import path from 'node:path'
import { beforeEach, describe, expect, test } from 'vitest'
import { CorruptStoreError } from './api-utils.js'
import { CredentialStore, isValid } from './credential-store.js'
import { makeCredential, tempDir } from './test-utils.js'

let dir: string
let store: CredentialStore

beforeEach(() => {
  dir = path.join(tempDir(), 'home')
  store = new CredentialStore({ path: path.join(dir, 'credentials.json') })
})

describe('CredentialStore', () => {
  test('load returns null when no credential was saved', () => {
    expect(store.load()).toBeNull()
  })

  test('save then load returns the same credential', () => {
    const credential = makeCredential()
    store.save(credential)
    expect(store.load()).toEqual(credential)
  })

  test('writes owner-only files and leaves no temp file behind', () => {
    store.save(makeCredential())
    expect(fs.statSync(store.path).mode & 0o777).toBe(0o600)
    expect(fs.statSync(dir).mode & 0o777).toBe(0o700)
    expect(fs.readdirSync(dir)).toEqual(['credentials.json'])
  })

  test('stores snake-case fields with an ISO expiry', () => {
    store.save(makeCredential())
    expect(JSON.parse(fs.readFileSync(store.path, 'utf-8'))).toEqual({
      access_token: 'test-access-token',
      refresh_token: 'test-refresh-token',
      expiry: '2030-01-01T00:00:00.000Z',
      scopes: ['https://www.googleapis.com/auth/gmail.modify'],
    })
  })

  test('invalid JSON is reported and the file is left untouched', () => {
    fs.mkdirSync(dir, { recursive: true })
    fs.writeFileSync(store.path, '{not json')
    const result = store.load()
    expect(result).toBeInstanceOf(CorruptStoreError)
    expect(fs.readFileSync(store.path, 'utf-8')).toBe('{not json')
  })

  test('missing fields and unparseable expiry are corrupt', () => {
    fs.mkdirSync(dir, { recursive: true })
    fs.writeFileSync(store.path, JSON.stringify({ access_token: 'a', scopes: [] }))
    expect(store.load()).toBeInstanceOf(CorruptStoreError)

    fs.writeFileSync(store.path, JSON.stringify({ access_token: 'a', refresh_token: 'r', expiry: 'soon', scopes: [] }))
    expect(store.load()).toBeInstanceOf(CorruptStoreError)
  })

  test('clear removes the file and is safe to repeat', () => {
    store.save(makeCredential())
    store.clear()
    store.clear()
    expect(store.load()).toBeNull()
  })
})

describe('isValid', () => {
  const now = new Date('2029-12-31T23:00:00.000Z')

  test('needs a refresh token and a future expiry', () => {
    expect(isValid(makeCredential(), now)).toBe(true)
    expect(isValid(makeCredential({ refreshToken: '' }), now)).toBe(false)
    expect(isValid(makeCredential({ expiry: new Date('2029-12-31T22:59:59.000Z') }), now)).toBe(false)
  })
})

import fs from 'node:fs'
import path from 'node:path'
import { describe, expect, test } from 'vitest'
import { openDatabase, splitStatements } from './db.js'
import { tempDir } from './test-utils.js'

describe('splitStatements', () => {
  test('a semicolon inside a comment does not end a statement', () => {
    const sql = [
      '-- Applied on startup; keep it idempotent.',
      'CREATE TABLE IF NOT EXISTS a (id TEXT);',
      '',
      '-- second table',
      'CREATE TABLE IF NOT EXISTS b (id TEXT);',
    ].join('\n')
    expect(splitStatements(sql)).toEqual(['CREATE TABLE IF NOT EXISTS a (id TEXT)', 'CREATE TABLE IF NOT EXISTS b (id TEXT)'])
  })
})

describe('openDatabase', () => {
  test('applies the bundled schema to a fresh file, twice', () => {
    const dbPath = path.join(tempDir(), 'nested', 'ledger.db')

    const first = openDatabase(dbPath)
    first.close()
    const db = openDatabase(dbPath)
    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((t) => t.name)
    db.close()

    expect(tables).toEqual(['claims', 'processed_messages'])
    expect(fs.statSync(dbPath).mode & 0o777).toBe(0o600)
  })
})

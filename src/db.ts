// SQLite setup for the mailwright ledger.
// Opens (or creates) the database with better-sqlite3, enables WAL, and runs
// idempotent schema setup from src/schema.sql on every open.

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import Database from 'better-sqlite3'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export type Db = Database.Database

export function openDatabase(dbPath: string): Db {
  const dir = path.dirname(dbPath)
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 })
  }

  const db = new Database(dbPath)

  // WAL: concurrent readers + single writer, persists on the DB file.
  // busy_timeout: wait up to 5s for a lock (e.g. `mailwright ledger` while `run` writes).
  db.pragma('journal_mode = WAL')
  db.pragma('busy_timeout = 5000')
  db.pragma('synchronous = FULL')

  applySchema(db)
  secureDatabase(dbPath)

  return db
}

function applySchema(db: Db): void {
  // From source (vitest/tsx) __dirname is src/; from dist the schema stays in src/
  let schemaPath = path.join(__dirname, 'schema.sql')
  if (!fs.existsSync(schemaPath)) {
    schemaPath = path.join(__dirname, '..', 'src', 'schema.sql')
  }

  const statements = splitStatements(fs.readFileSync(schemaPath, 'utf-8'))

  const apply = db.transaction(() => {
    for (const statement of statements) {
      db.prepare(statement).run()
    }
  })
  apply()
}

/** Statements of a schema file. Comment lines are dropped before splitting on
 *  `;`, so a semicolon inside a comment never ends a statement. */
export function splitStatements(sql: string): string[] {
  return sql
    .split('\n')
    .filter((line) => !line.trimStart().startsWith('--'))
    .join('\n')
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

/** Owner-only permissions, including the -wal and -shm files WAL mode creates. */
function secureDatabase(dbPath: string): void {
  for (const filePath of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    if (fs.existsSync(filePath)) {
      fs.chmodSync(filePath, 0o600)
    }
  }
}

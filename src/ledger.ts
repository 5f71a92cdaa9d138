// Processed-message ledger, backed by SQLite (better-sqlite3).
// Every handled message gets exactly one row: the action that was decided,
// when it was applied and whether it succeeded. Rows are write-once; a second
// record() for the same id is a DuplicateEntryError, never an overwrite.
//
// Claims are the write-ahead half: the orchestrator claims a message with its
// decided action before touching Gmail, and record() deletes the claim in the
// same transaction that writes the row. After a crash, a leftover claim tells
// the next run which action was already in flight for that message.

import { ActionSchema, type Action } from './decision-policy.js'
import { CorruptStoreError, DuplicateEntryError } from './api-utils.js'
import { openDatabase, type Db } from './db.js'

export type Outcome = { status: 'success' } | { status: 'failed'; reason: string }

export interface LedgerEntry {
  messageId: string
  action: Action
  appliedAt: Date
  outcome: Outcome
}

export interface Claim {
  messageId: string
  action: Action
  claimedAt: Date
}

// Row shapes for typed .prepare() queries
interface EntryRow {
  message_id: string
  action: string
  applied_at: number
  outcome: string
  reason: string | null
}
interface ClaimRow {
  message_id: string
  action: string
  claimed_at: number
}

// SQLite caps bound parameters per statement; stay well below it
const IN_CHUNK_SIZE = 500

export class ProcessedLedger {
  readonly path: string
  private db: Db

  constructor({ dbPath }: { dbPath: string }) {
    this.path = dbPath
    this.db = openDatabase(dbPath)
  }

  has(messageId: string): boolean {
    const row = this.db
      .prepare<[string], { one: number }>('SELECT 1 AS one FROM processed_messages WHERE message_id = ?')
      .get(messageId)
    return row !== undefined
  }

  /** Ids from `messageIds` with no ledger row, in input order, deduplicated. */
  listUnprocessed(messageIds: string[]): string[] {
    const unique = [...new Set(messageIds)]
    const seen = new Set<string>()

    for (let i = 0; i < unique.length; i += IN_CHUNK_SIZE) {
      const chunk = unique.slice(i, i + IN_CHUNK_SIZE)
      const placeholders = chunk.map(() => '?').join(', ')
      const rows = this.db
        .prepare<string[], { message_id: string }>(
          `SELECT message_id FROM processed_messages WHERE message_id IN (${placeholders})`,
        )
        .all(...chunk)
      for (const row of rows) seen.add(row.message_id)
    }

    return unique.filter((id) => !seen.has(id))
  }

  record(entry: LedgerEntry): void | DuplicateEntryError {
    const write = this.db.transaction((e: LedgerEntry) => {
      const info = this.db
        .prepare(
          `INSERT INTO processed_messages (message_id, action, applied_at, outcome, reason)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT (message_id) DO NOTHING`,
        )
        .run(
          e.messageId,
          JSON.stringify(e.action),
          e.appliedAt.getTime(),
          e.outcome.status,
          e.outcome.status === 'failed' ? e.outcome.reason : null,
        )
      this.db.prepare('DELETE FROM claims WHERE message_id = ?').run(e.messageId)
      return info.changes
    })

    const changes = write(entry)
    if (changes === 0) return new DuplicateEntryError({ messageId: entry.messageId })
  }

  get(messageId: string): LedgerEntry | null | CorruptStoreError {
    const row = this.db
      .prepare<[string], EntryRow>(
        'SELECT message_id, action, applied_at, outcome, reason FROM processed_messages WHERE message_id = ?',
      )
      .get(messageId)
    if (!row) return null
    return this.toEntry(row)
  }

  /** Most recent entries first. */
  list({ limit = 50 }: { limit?: number } = {}): LedgerEntry[] | CorruptStoreError {
    const rows = this.db
      .prepare<[number], EntryRow>(
        `SELECT message_id, action, applied_at, outcome, reason FROM processed_messages
         ORDER BY applied_at DESC, message_id ASC LIMIT ?`,
      )
      .all(limit)

    const entries: LedgerEntry[] = []
    for (const row of rows) {
      const entry = this.toEntry(row)
      if (entry instanceof Error) return entry
      entries.push(entry)
    }
    return entries
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM processed_messages').get()
    return row?.n ?? 0
  }

  // ---------------------------------------------------------------------------
  // Write-ahead claims
  // ---------------------------------------------------------------------------

  /** Claim a message for `action`. An existing claim is kept as-is. */
  claim(messageId: string, action: Action, now: Date = new Date()): void {
    this.db
      .prepare('INSERT OR IGNORE INTO claims (message_id, action, claimed_at) VALUES (?, ?, ?)')
      .run(messageId, JSON.stringify(action), now.getTime())
  }

  getClaim(messageId: string): Claim | null | CorruptStoreError {
    const row = this.db
      .prepare<[string], ClaimRow>('SELECT message_id, action, claimed_at FROM claims WHERE message_id = ?')
      .get(messageId)
    if (!row) return null
    const action = this.parseAction(row.action, row.message_id)
    if (action instanceof Error) return action
    return { messageId: row.message_id, action, claimedAt: new Date(row.claimed_at) }
  }

  close(): void {
    this.db.close()
  }

  private toEntry(row: EntryRow): LedgerEntry | CorruptStoreError {
    const action = this.parseAction(row.action, row.message_id)
    if (action instanceof Error) return action

    let outcome: Outcome
    if (row.outcome === 'success') {
      outcome = { status: 'success' }
    } else if (row.outcome === 'failed') {
      outcome = { status: 'failed', reason: row.reason ?? '' }
    } else {
      return new CorruptStoreError({ store: 'ledger', path: this.path, reason: `unknown outcome for ${row.message_id}` })
    }

    return { messageId: row.message_id, action, appliedAt: new Date(row.applied_at), outcome }
  }

  private parseAction(raw: string, messageId: string): Action | CorruptStoreError {
    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (err) {
      return new CorruptStoreError({ store: 'ledger', path: this.path, reason: `unreadable action for ${messageId}`, cause: err })
    }
    const parsed = ActionSchema.safeParse(json)
    if (!parsed.success) {
      return new CorruptStoreError({ store: 'ledger', path: this.path, reason: `invalid action for ${messageId}` })
    }
    return parsed.data
  }
}

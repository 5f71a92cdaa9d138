// ledger command: list what the processing loop has recorded.

import type { Goke } from 'goke'
import { z } from 'zod'
import { loadConfig } from '../config.js'
import { describeAction } from '../decision-policy.js'
import { ProcessedLedger } from '../ledger.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

export function registerLedgerCommands(cli: Goke) {
  cli
    .command('ledger', 'List processed messages, newest first')
    .option('--limit [limit]', z.string().describe('Maximum entries to show (default: 50)'))
    .action(async (options) => {
      const limit = options.limit ? Number(options.limit) : 50
      if (!Number.isInteger(limit) || limit < 1) {
        out.error('--limit must be a positive integer')
        process.exit(1)
      }

      const config = loadConfig()
      if (config instanceof Error) handleCommandError(config)

      const ledger = new ProcessedLedger({ dbPath: config.ledgerPath })
      const entries = ledger.list({ limit })
      const total = ledger.count()
      ledger.close()
      if (entries instanceof Error) handleCommandError(entries)

      if (entries.length === 0) {
        out.hint('No messages processed yet')
        return
      }

      out.printList(
        entries.map((e) => ({
          message_id: e.messageId,
          action: describeAction(e.action),
          applied_at: e.appliedAt.toISOString(),
          outcome: e.outcome.status,
          ...(e.outcome.status === 'failed' ? { reason: e.outcome.reason } : {}),
        })),
        { summary: `${entries.length} of ${total} entries` },
      )
    })
}

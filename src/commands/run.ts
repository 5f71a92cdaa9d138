// run command: the poll → decide → apply → record loop.
// Ctrl+C aborts between messages; an apply in progress finishes and is
// recorded before the process exits with code 0.

import type { Goke } from 'goke'
import { z } from 'zod'
import { ConfigError } from '../api-utils.js'
import { readPolicySecret } from '../config.js'
import { describeAction, type DecisionPolicy } from '../decision-policy.js'
import { ProcessedLedger } from '../ledger.js'
import { ModelPolicy, OpenAIChatCompleter } from '../model-policy.js'
import { Orchestrator, type CycleReport } from '../orchestrator.js'
import { loadRules } from '../rule-policy.js'
import { openSession } from '../session.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

function parsePositive(flag: string, value: string | undefined): number | undefined | ConfigError {
  if (value === undefined) return undefined
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    return new ConfigError({ field: flag, reason: 'must be a positive integer' })
  }
  return n
}

function buildPolicy(options: {
  policy?: string
  rules?: string
  replyMode?: string
  model: string
}): DecisionPolicy | ConfigError {
  const kind = options.policy ?? 'rules'

  if (kind === 'rules') {
    if (!options.rules) {
      return new ConfigError({ field: '--rules', reason: 'a rules file is required with --policy rules' })
    }
    return loadRules(options.rules)
  }

  if (kind === 'model') {
    const replyMode = options.replyMode ?? 'draft'
    if (replyMode !== 'draft' && replyMode !== 'send') {
      return new ConfigError({ field: '--reply-mode', reason: 'must be draft or send' })
    }
    const apiKey = readPolicySecret()
    if (apiKey instanceof Error) return apiKey
    return new ModelPolicy({ completer: new OpenAIChatCompleter({ apiKey, model: options.model }), replyMode })
  }

  return new ConfigError({ field: '--policy', reason: `unknown policy "${kind}" (expected rules or model)` })
}

function printCycle(report: CycleReport) {
  if (report.processed.length === 0) return
  out.printList(
    report.processed.map((p) => ({
      message_id: p.messageId,
      action: describeAction(p.action),
      result: p.result,
      ...(p.reason ? { reason: p.reason } : {}),
    })),
    { summary: `${report.processed.length} handled, ${report.skipped} skipped of ${report.listed} listed` },
  )
}

export function registerRunCommands(cli: Goke) {
  cli
    .command('run', 'Process matching messages: decide an action per message and apply it exactly once')
    .option('--once', z.boolean().describe('Run a single cycle and exit'))
    .option('--interval [interval]', z.string().describe('Poll interval in seconds (default: MAILWRIGHT_POLL_INTERVAL or 60)'))
    .option('--query [query]', z.string().describe('Gmail search query selecting candidate messages (default: in:inbox is:unread)'))
    .option('--policy [policy]', z.string().describe('Decision policy: rules or model (default: rules)'))
    .option('--rules [rules]', z.string().describe('JSON rules file for --policy rules'))
    .option('--reply-mode [replyMode]', z.string().describe('For --policy model: draft (default) or send'))
    .option('--max-results [maxResults]', z.string().describe('Messages listed per cycle (default: 25)'))
    .action(async (options) => {
      const interval = parsePositive('--interval', options.interval)
      if (interval instanceof Error) handleCommandError(interval)
      const maxResults = parsePositive('--max-results', options.maxResults)
      if (maxResults instanceof Error) handleCommandError(maxResults)

      const session = openSession({ interactive: process.stdin.isTTY ?? false, maxResults })
      if (session instanceof Error) handleCommandError(session)
      const { config, client } = session

      // Policy secrets are checked before anything touches Gmail
      const policy = buildPolicy({ ...options, model: config.model })
      if (policy instanceof Error) handleCommandError(policy)

      const ledger = new ProcessedLedger({ dbPath: config.ledgerPath })
      const query = options.query ?? config.query
      const intervalMs = interval ? interval * 1000 : config.pollIntervalMs

      const orchestrator = new Orchestrator({
        client,
        ledger,
        policy,
        query,
        policyTimeoutMs: config.policyTimeoutMs,
      })

      const controller = new AbortController()
      const stop = () => {
        if (controller.signal.aborted) return
        out.hint('Stopping after the current message...')
        controller.abort()
      }
      process.on('SIGINT', stop)
      process.on('SIGTERM', stop)

      out.hint(
        options.once
          ? `Running one cycle for "${query}" with the ${policy.name} policy`
          : `Polling "${query}" every ${Math.round(intervalMs / 1000)}s with the ${policy.name} policy (Ctrl+C to stop)`,
      )

      const result = await orchestrator.run({
        signal: controller.signal,
        intervalMs,
        once: options.once ?? false,
        onCycle: printCycle,
      })
      ledger.close()

      if (result instanceof Error) handleCommandError(result)
      out.success(`Stopped after ${result.cycles} cycle(s), ${result.processed} message(s) handled`)
      process.exit(0)
    })
}

#!/usr/bin/env node

// mailwright: Gmail automation CLI built on goke.
// Entry point: registers all commands, help, and version.
// Uses goke for command parsing with zod schemas for type-safe options.

import { goke } from 'goke'
import { registerAuthCommands } from './commands/auth-cmd.js'
import { registerRunCommands } from './commands/run.js'
import { registerLedgerCommands } from './commands/ledger.js'

const cli = goke('mailwright')

// Auth first so login/logout/status appear at the top of --help
registerAuthCommands(cli)
registerRunCommands(cli)
registerLedgerCommands(cli)

cli.help()
cli.version('0.1.0')

cli.parse()

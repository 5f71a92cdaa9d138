// Auth commands: login, logout, status.
// One account per mailwright home; login replaces whatever credential is stored.

import type { Goke } from 'goke'
import * as errore from 'errore'
import { ApiError, describeError } from '../api-utils.js'
import { CredentialStore } from '../credential-store.js'
import { loadConfig } from '../config.js'
import { openSession } from '../session.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

export function registerAuthCommands(cli: Goke) {
  cli
    .command('login', 'Authenticate with Google (opens a consent URL). On a remote/headless machine, complete consent in any browser and paste back the localhost redirect URL containing the auth code.')
    .action(async () => {
      const session = openSession({ interactive: true })
      if (session instanceof Error) handleCommandError(session)

      const credential = await session.client.reauthorize()
      if (credential instanceof Error) handleCommandError(credential)

      const profile = await session.client.getProfile()
      if (profile instanceof Error) handleCommandError(profile)

      out.success(`Authenticated as ${profile.emailAddress}`)
      process.exit(0)
    })

  cli
    .command('logout', 'Revoke and remove the stored credential')
    .option('--force', 'Skip confirmation')
    .action(async (options) => {
      const session = openSession({ interactive: false })
      if (session instanceof Error) handleCommandError(session)

      const credential = session.store.load()
      if (credential instanceof Error) handleCommandError(credential)
      if (!credential) {
        out.hint('Not authenticated')
        return
      }

      if (!options.force) {
        if (!process.stdin.isTTY) {
          out.error('Use --force to logout non-interactively')
          process.exit(1)
        }

        const readline = await import('node:readline')
        const rl = readline.createInterface({ input: process.stdin, output: process.stderr })
        const answer = await new Promise<string>((resolve) => {
          rl.question('Revoke and remove the stored credential? [y/N] ', resolve)
        })
        rl.close()

        if (answer.toLowerCase() !== 'y') {
          out.hint('Cancelled')
          return
        }
      }

      const revoked = await errore.tryAsync({
        try: () => session.oauth.revoke(credential.refreshToken),
        catch: (err) => new ApiError({ reason: `revoke failed: ${describeError(err)}`, cause: err }),
      })
      if (revoked instanceof Error) {
        out.warn(`${revoked.message}; removing the local credential anyway`)
      }

      session.store.clear()
      out.success('Credential removed')
    })

  cli
    .command('status', 'Show the stored credential (expiry and scopes, never tokens)')
    .action(async () => {
      const config = loadConfig()
      if (config instanceof Error) handleCommandError(config)

      const store = new CredentialStore({ path: config.credentialPath })
      const credential = store.load()
      if (credential instanceof Error) handleCommandError(credential)

      if (!credential) {
        out.hint('Not authenticated. Run: mailwright login')
        return
      }

      const valid = store.isValid(credential)
      out.printYaml({
        credential_file: config.credentialPath,
        status: valid ? 'valid' : 'expired',
        expires: credential.expiry.toISOString(),
        refreshable: credential.refreshToken.length > 0,
        scopes: credential.scopes,
      })
    })
}

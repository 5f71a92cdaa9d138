// Wiring shared by the CLI commands: config, client secret, credential store
// and a GmailClient whose missing credential can be resolved by the
// interactive consent flow.

import { ConsentAuthorizationFlow, GoogleOAuthClient, LocalCallbackTransport } from './auth.js'
import { ConfigError } from './api-utils.js'
import { loadClientSecret, loadConfig, type AppConfig } from './config.js'
import { CredentialStore } from './credential-store.js'
import { GmailClient, GoogleGmailTransport } from './gmail-client.js'

export interface Session {
  config: AppConfig
  store: CredentialStore
  oauth: GoogleOAuthClient
  client: GmailClient
}

export function openSession({
  interactive = true,
  maxResults,
}: {
  /** Allow the consent flow when no usable credential is stored. */
  interactive?: boolean
  maxResults?: number
} = {}): Session | ConfigError {
  const config = loadConfig()
  if (config instanceof Error) return config

  const secret = loadClientSecret(config.clientSecretPath)
  if (secret instanceof Error) return secret

  const store = new CredentialStore({ path: config.credentialPath })
  const oauth = new GoogleOAuthClient(secret)
  const flow = interactive
    ? new ConsentAuthorizationFlow({
        oauth,
        transport: new LocalCallbackTransport({ redirectUri: secret.redirectUri }),
        timeoutMs: config.consentTimeoutMs,
      })
    : undefined

  const client = new GmailClient({
    store,
    oauth,
    transport: new GoogleGmailTransport({ timeoutMs: config.callTimeoutMs }),
    flow,
    retry: config.retry,
    maxResults: maxResults ?? config.maxResults,
  })

  return { config, store, oauth, client }
}

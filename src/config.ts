// Configuration for mailwright.
// Everything lives under ~/.mailwright (override with MAILWRIGHT_HOME):
// the OAuth credential file, the processed-message ledger and, by default,
// the Google client secret file downloaded from the Cloud console.
// Environment overrides are validated with zod; problems come back as
// ConfigError values so the CLI can report them before the loop starts.

import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { z } from 'zod'
import { ConfigError, DEFAULT_RETRY, type RetryOptions } from './api-utils.js'
import { DEFAULT_CONSENT_TIMEOUT_MS } from './auth.js'
import { DEFAULT_MODEL } from './model-policy.js'

export const DEFAULT_QUERY = 'in:inbox is:unread'
export const DEFAULT_REDIRECT_URI = 'http://localhost:8089'
export const POLICY_SECRET_ENV = 'GROQ_API_KEY'

export interface AppConfig {
  homeDir: string
  credentialPath: string
  ledgerPath: string
  clientSecretPath: string
  query: string
  pollIntervalMs: number
  maxResults: number
  consentTimeoutMs: number
  callTimeoutMs: number
  policyTimeoutMs: number
  model: string
  retry: Required<Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs'>>
}

const positiveInt = z.coerce.number().int().positive()

const EnvSchema = z.object({
  MAILWRIGHT_HOME: z.string().min(1).optional(),
  MAILWRIGHT_CLIENT_SECRET: z.string().min(1).optional(),
  MAILWRIGHT_QUERY: z.string().min(1).optional(),
  MAILWRIGHT_POLL_INTERVAL: positiveInt.optional(),
  MAILWRIGHT_MAX_ATTEMPTS: positiveInt.max(20).optional(),
  MAILWRIGHT_CONSENT_TIMEOUT: positiveInt.optional(),
  MAILWRIGHT_MODEL: z.string().min(1).optional(),
})

/** Build the app config from environment overrides. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig | ConfigError {
  const relevant = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('MAILWRIGHT_') && value !== ''),
  )
  const parsed = EnvSchema.safeParse(relevant)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return new ConfigError({
      field: String(issue?.path[0] ?? 'environment'),
      reason: issue?.message ?? 'invalid value',
    })
  }
  const vars = parsed.data

  const homeDir = vars.MAILWRIGHT_HOME ?? path.join(os.homedir(), '.mailwright')

  return {
    homeDir,
    credentialPath: path.join(homeDir, 'credentials.json'),
    ledgerPath: path.join(homeDir, 'ledger.db'),
    clientSecretPath: vars.MAILWRIGHT_CLIENT_SECRET ?? path.join(homeDir, 'client_secret.json'),
    query: vars.MAILWRIGHT_QUERY ?? DEFAULT_QUERY,
    pollIntervalMs: (vars.MAILWRIGHT_POLL_INTERVAL ?? 60) * 1000,
    maxResults: 25,
    consentTimeoutMs: vars.MAILWRIGHT_CONSENT_TIMEOUT ? vars.MAILWRIGHT_CONSENT_TIMEOUT * 1000 : DEFAULT_CONSENT_TIMEOUT_MS,
    callTimeoutMs: 30_000,
    policyTimeoutMs: 60_000,
    model: vars.MAILWRIGHT_MODEL ?? DEFAULT_MODEL,
    retry: {
      maxAttempts: vars.MAILWRIGHT_MAX_ATTEMPTS ?? DEFAULT_RETRY.maxAttempts,
      baseDelayMs: DEFAULT_RETRY.baseDelayMs,
      maxDelayMs: DEFAULT_RETRY.maxDelayMs,
    },
  }
}

// ---------------------------------------------------------------------------
// Client secret file (read-only, provided by the user)
// ---------------------------------------------------------------------------

export interface ClientSecret {
  clientId: string
  clientSecret: string
  redirectUri: string
}

const ClientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
})

// Google's download wraps the entry in "installed" (desktop) or "web"
const ClientSecretFileSchema = z.union([
  z.object({ installed: ClientEntrySchema }),
  z.object({ web: ClientEntrySchema }),
])

export function loadClientSecret(filePath: string): ClientSecret | ConfigError {
  if (!fs.existsSync(filePath)) {
    return new ConfigError({
      field: 'client secret',
      reason: `${filePath} not found. Download an OAuth client (Desktop app) JSON from the Google Cloud console`,
    })
  }

  let json: unknown
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (err) {
    return new ConfigError({ field: 'client secret', reason: `${filePath} is not valid JSON`, cause: err })
  }

  const parsed = ClientSecretFileSchema.safeParse(json)
  if (!parsed.success) {
    return new ConfigError({
      field: 'client secret',
      reason: `${filePath} must contain an "installed" or "web" entry with client_id and client_secret`,
    })
  }

  const entry = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web
  const redirectUri = entry.redirect_uris?.find((uri) => uri.startsWith('http://localhost')) ?? DEFAULT_REDIRECT_URI

  return {
    clientId: entry.client_id,
    clientSecret: entry.client_secret,
    redirectUri: redirectUri === 'http://localhost' ? DEFAULT_REDIRECT_URI : redirectUri,
  }
}

/** The decision policy's backing-service key. Read once at startup. */
export function readPolicySecret(env: NodeJS.ProcessEnv = process.env): string | ConfigError {
  const value = env[POLICY_SECRET_ENV]?.trim()
  if (!value) {
    return new ConfigError({ field: POLICY_SECRET_ENV, reason: 'not set; the model policy needs it' })
  }
  return value
}

// File-backed store for the delegated-access OAuth credential.
// One credential per store (single account). The file lives in a 0700
// directory with mode 0600 and is replaced atomically: the new contents are
// written to a temp file beside it and renamed over the target, so a crash
// mid-write leaves either the old file or the new one, never a partial one.
// Token values are never logged; callers get the credential as an opaque value.

import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { CorruptStoreError } from './api-utils.js'

export interface Credential {
  accessToken: string
  refreshToken: string
  expiry: Date
  scopes: string[]
}

/** On-disk shape. Snake-case keys match what Google's token endpoint returns. */
const StoredCredentialSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  expiry: z.string(),
  scopes: z.array(z.string()),
})

/** A credential is valid iff it can be refreshed and has not expired yet. */
export function isValid(credential: Credential, now: Date): boolean {
  return credential.refreshToken.length > 0 && credential.expiry.getTime() > now.getTime()
}

/** Expired but still refreshable: calls for a refresh, not a new consent. */
export function isRefreshable(credential: Credential): boolean {
  return credential.refreshToken.length > 0
}

export class CredentialStore {
  readonly path: string

  constructor({ path: filePath }: { path: string }) {
    this.path = filePath
  }

  load(): Credential | null | CorruptStoreError {
    let data: string
    try {
      data = fs.readFileSync(this.path, 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) return null
      return new CorruptStoreError({ store: 'credential file', path: this.path, reason: 'unreadable', cause: err })
    }

    let json: unknown
    try {
      json = JSON.parse(data)
    } catch (err) {
      return new CorruptStoreError({ store: 'credential file', path: this.path, reason: 'invalid JSON', cause: err })
    }

    const parsed = StoredCredentialSchema.safeParse(json)
    if (!parsed.success) {
      const fields = parsed.error.issues.map((i) => i.path.join('.')).join(', ')
      return new CorruptStoreError({ store: 'credential file', path: this.path, reason: `invalid fields: ${fields}` })
    }

    const expiry = new Date(parsed.data.expiry)
    if (Number.isNaN(expiry.getTime())) {
      return new CorruptStoreError({ store: 'credential file', path: this.path, reason: 'invalid expiry' })
    }

    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      expiry,
      scopes: parsed.data.scopes,
    }
  }

  save(credential: Credential): void {
    const dir = path.dirname(this.path)
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 })
    }

    const body: z.infer<typeof StoredCredentialSchema> = {
      access_token: credential.accessToken,
      refresh_token: credential.refreshToken,
      expiry: credential.expiry.toISOString(),
      scopes: credential.scopes,
    }

    const tmpPath = `${this.path}.${process.pid}.tmp`
    const fd = fs.openSync(tmpPath, 'w', 0o600)
    try {
      fs.writeFileSync(fd, JSON.stringify(body, null, 2))
      fs.fsyncSync(fd)
    } finally {
      fs.closeSync(fd)
    }
    fs.renameSync(tmpPath, this.path)
  }

  clear(): void {
    fs.rmSync(this.path, { force: true })
  }

  isValid(credential: Credential, now: Date = new Date()): boolean {
    return isValid(credential, now)
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}

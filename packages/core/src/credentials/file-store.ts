/**
 * File-backed credential storage (token.json).
 * Writes go to a temp file first and are renamed into place, so a crash
 * mid-write never leaves a half-written token behind.
 */

import { writeFile, readFile, unlink, rename, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { TaskSyncError, errorMessage } from '../common/index.js'
import { CREDENTIAL_BLOB_VERSION, StoredCredentialSchema } from './schemas.js'
import type { Credential, StoredCredential } from './schemas.js'
import type { CredentialStore } from './store.js'

function isMissingFile(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT'
}

export class FileCredentialStore implements CredentialStore {
  constructor(private readonly path: string) {}

  get location(): string {
    return this.path
  }

  async load(): Promise<Credential | null> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf8')
    } catch (e) {
      if (isMissingFile(e)) return null
      throw TaskSyncError.corruptState(`Cannot read credential file: ${errorMessage(e)}`)
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      throw TaskSyncError.corruptState('Credential file is not valid JSON')
    }

    const parsed = StoredCredentialSchema.safeParse(json)
    if (!parsed.success) {
      const detail = parsed.error.issues[0]?.message ?? 'invalid'
      throw TaskSyncError.corruptState(`Credential file has an unexpected shape: ${detail}`)
    }

    const { accessToken, refreshToken, expiresAt, scopes } = parsed.data
    return { accessToken, refreshToken, expiresAt, scopes }
  }

  async save(credential: Credential): Promise<void> {
    const blob: StoredCredential = {
      version: CREDENTIAL_BLOB_VERSION,
      accessToken: credential.accessToken,
      refreshToken: credential.refreshToken,
      expiresAt: credential.expiresAt,
      scopes: [...credential.scopes],
      savedAt: new Date().toISOString(),
    }

    const tmpPath = `${this.path}.${process.pid}.tmp`
    await mkdir(dirname(this.path), { recursive: true })
    await writeFile(tmpPath, JSON.stringify(blob, null, 2), { mode: 0o600 })
    await rename(tmpPath, this.path)
  }

  async clear(): Promise<void> {
    try {
      await unlink(this.path)
    } catch (e) {
      if (!isMissingFile(e)) throw e
    }
  }
}

/**
 * Credential persistence contract.
 *
 * `load` throws CORRUPT_STATE when stored material exists but cannot be read
 * back; the caller decides whether to clear it.
 */

import type { Credential } from './schemas.js'

export interface CredentialStore {
  load(): Promise<Credential | null>
  save(credential: Credential): Promise<void>
  clear(): Promise<void>
}

export class MemoryCredentialStore implements CredentialStore {
  private current: Credential | null

  constructor(initial: Credential | null = null) {
    this.current = initial ? { ...initial, scopes: [...initial.scopes] } : null
  }

  async load(): Promise<Credential | null> {
    return this.current ? { ...this.current, scopes: [...this.current.scopes] } : null
  }

  async save(credential: Credential): Promise<void> {
    this.current = { ...credential, scopes: [...credential.scopes] }
  }

  async clear(): Promise<void> {
    this.current = null
  }
}

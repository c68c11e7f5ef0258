/**
 * Credential lifecycle: load → validate → refresh → interactive sign-in.
 *
 * Owns the single "current" credential for the process. All acquisition
 * work runs behind one in-flight promise; concurrent callers join it instead
 * of starting their own refresh or opening a second browser window.
 */

import { TaskSyncError, errorMessage, isTaskSyncError, toTaskSyncError } from '../common/index.js'
import { DEFAULT_EXPIRY_SKEW_MS, hasScopes, isCredentialValid, sameCredential } from './credential.js'
import type { Credential } from './schemas.js'
import type { CredentialStore } from './store.js'

export type CredentialState =
  | 'unloaded'
  | 'valid'
  | 'expired'
  | 'refreshing'
  | 'needs-interactive'
  | 'auth-failed'

/** Exchanges a refresh token for a new access token. */
export interface CredentialRefresher {
  refresh(credential: Credential): Promise<Credential>
}

/**
 * Runs an external sign-in handshake. Fails with CONFIG_MISSING when no
 * client configuration exists, USER_CANCELLED when the user backs out.
 */
export interface InteractiveAuthenticator {
  authenticate(): Promise<Credential>
}

export interface CredentialManagerOptions {
  store: CredentialStore
  refresher: CredentialRefresher
  authenticator: InteractiveAuthenticator
  requiredScopes: readonly string[]
  expirySkewMs?: number
  now?: () => number
}

export type CredentialStateListener = (state: CredentialState) => void

type AcquisitionKind = 'acquire' | 'force'

export class CredentialLifecycleManager {
  private current: Credential | null = null
  private inFlight: { kind: AcquisitionKind; promise: Promise<Credential> } | null = null
  private currentState: CredentialState = 'unloaded'
  private readonly listeners = new Set<CredentialStateListener>()
  private readonly store: CredentialStore
  private readonly refresher: CredentialRefresher
  private readonly authenticator: InteractiveAuthenticator
  private readonly requiredScopes: readonly string[]
  private readonly expirySkewMs: number
  private readonly now: () => number

  constructor(opts: CredentialManagerOptions) {
    this.store = opts.store
    this.refresher = opts.refresher
    this.authenticator = opts.authenticator
    this.requiredScopes = [...opts.requiredScopes]
    this.expirySkewMs = opts.expirySkewMs ?? DEFAULT_EXPIRY_SKEW_MS
    this.now = opts.now ?? Date.now
  }

  get state(): CredentialState {
    return this.currentState
  }

  /** The cached credential, without validating or acquiring. */
  peek(): Credential | null {
    return this.current
  }

  onStateChange(listener: CredentialStateListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  acquire(): Promise<Credential> {
    if (this.current && this.isValid(this.current)) {
      return Promise.resolve(this.current)
    }
    if (this.inFlight) return this.inFlight.promise

    if (this.current) this.setState('expired')
    return this.runExclusive('acquire', () => this.acquireFresh(true))
  }

  /**
   * Drop the current credential and its persisted copy, then acquire again.
   * Pass the credential the remote service rejected: if someone else already
   * replaced it, the replacement is returned without another cycle.
   */
  forceRefresh(rejected?: Credential): Promise<Credential> {
    if (this.inFlight?.kind === 'force') return this.inFlight.promise
    if (rejected && this.hasReplaced(rejected)) {
      return Promise.resolve(this.current ?? rejected)
    }

    const pending = this.inFlight?.promise
    return this.runExclusive('force', async () => {
      if (pending) await Promise.allSettled([pending])
      if (rejected && this.current && this.hasReplaced(rejected)) return this.current

      this.current = null
      await this.clearStored()
      return this.acquireFresh(false)
    })
  }

  /** Forget the credential locally and on disk. */
  async signOut(): Promise<void> {
    if (this.inFlight) await Promise.allSettled([this.inFlight.promise])
    this.current = null
    await this.store.clear()
    this.setState('unloaded')
  }

  private runExclusive(kind: AcquisitionKind, work: () => Promise<Credential>): Promise<Credential> {
    const promise: Promise<Credential> = work().finally(() => {
      if (this.inFlight?.promise === promise) this.inFlight = null
    })
    this.inFlight = { kind, promise }
    return promise
  }

  private async acquireFresh(useStore: boolean): Promise<Credential> {
    try {
      const stored = useStore ? await this.loadStored() : null

      if (stored && this.isValid(stored)) {
        return this.adopt(stored, false)
      }

      const refreshable = this.refreshCandidate(stored)
      if (refreshable) {
        this.setState('refreshing')
        try {
          const refreshed = await this.refresher.refresh(refreshable)
          return await this.adopt({
            ...refreshed,
            refreshToken: refreshed.refreshToken ?? refreshable.refreshToken,
          }, true)
        } catch (e) {
          const error = toTaskSyncError(e)
          // Surfaced as-is, storage untouched
          if (error.code === 'CONFIG_MISSING' || error.code === 'USER_CANCELLED') throw error
          console.warn('[credential-manager] Token refresh failed, signing in again:', error.message)
          this.current = null
          await this.clearStored()
        }
      } else if (stored) {
        this.setState('expired')
        await this.clearStored()
      }

      this.setState('needs-interactive')
      const fresh = await this.authenticator.authenticate()
      if (!hasScopes(fresh, this.requiredScopes)) {
        throw TaskSyncError.userCancelled(
          `Sign-in did not grant the required permissions: ${this.requiredScopes.join(' ')}`,
        )
      }
      return await this.adopt(fresh, true)
    } catch (e) {
      this.setState('auth-failed')
      throw toTaskSyncError(e)
    }
  }

  /**
   * The stored credential if it can be refreshed, else the one held in
   * memory. The latter covers a credential whose save failed earlier.
   */
  private refreshCandidate(stored: Credential | null): Credential | null {
    for (const candidate of [stored, this.current]) {
      if (candidate?.refreshToken && hasScopes(candidate, this.requiredScopes)) return candidate
    }
    return null
  }

  /** A corrupt store heals once: cleared and treated as empty. */
  private async loadStored(): Promise<Credential | null> {
    try {
      return await this.store.load()
    } catch (e) {
      if (!isTaskSyncError(e) || e.code !== 'CORRUPT_STATE') throw e
      console.warn('[credential-manager] Discarding unreadable stored credential:', e.message)
      await this.store.clear()
      return null
    }
  }

  private async clearStored(): Promise<void> {
    try {
      await this.store.clear()
    } catch (e) {
      console.warn('[credential-manager] Could not clear stored credential:', errorMessage(e))
    }
  }

  private async adopt(credential: Credential, persist: boolean): Promise<Credential> {
    if (persist) {
      try {
        await this.store.save(credential)
      } catch (e) {
        console.warn(
          '[credential-manager] Could not persist credential; the next start will ask to sign in again:',
          errorMessage(e),
        )
      }
    }
    this.current = credential
    this.setState('valid')
    return credential
  }

  private hasReplaced(rejected: Credential): boolean {
    return this.current !== null && !sameCredential(this.current, rejected) && this.isValid(this.current)
  }

  private isValid(credential: Credential): boolean {
    return isCredentialValid(credential, {
      requiredScopes: this.requiredScopes,
      now: this.now(),
      skewMs: this.expirySkewMs,
    })
  }

  private setState(state: CredentialState): void {
    if (state === this.currentState) return
    this.currentState = state
    for (const listener of this.listeners) listener(state)
  }
}

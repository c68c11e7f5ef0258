/**
 * Runs remote operations with a credential, retrying once after a forced
 * refresh when the service rejects it.
 *
 * At most two invocations of the operation per call. A second rejection
 * becomes AUTH_EXPIRED; any other failure is returned without retry.
 */

import { Err, Ok, TaskSyncError, isAuthorizationError, toTaskSyncError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { Credential } from '../credentials/index.js'

export type AuthenticatedOperation<T> = (credential: Credential) => Promise<T>

/** The part of the credential manager the executor needs. */
export interface CredentialSource {
  acquire(): Promise<Credential>
  forceRefresh(rejected?: Credential): Promise<Credential>
}

export class AuthenticatedExecutor {
  constructor(private readonly credentials: CredentialSource) {}

  async execute<T>(operation: AuthenticatedOperation<T>): Promise<Result<T, TaskSyncError>> {
    let credential: Credential
    try {
      credential = await this.credentials.acquire()
    } catch (e) {
      return Err(toTaskSyncError(e))
    }

    try {
      return Ok(await operation(credential))
    } catch (e) {
      if (!isAuthorizationError(e)) return Err(toTaskSyncError(e))
      console.warn('[executor] Remote rejected credential, refreshing once')
    }

    let refreshed: Credential
    try {
      refreshed = await this.credentials.forceRefresh(credential)
    } catch (e) {
      return Err(toTaskSyncError(e))
    }

    try {
      return Ok(await operation(refreshed))
    } catch (e) {
      if (isAuthorizationError(e)) return Err(TaskSyncError.authExpired())
      return Err(toTaskSyncError(e))
    }
  }
}

/**
 * Typed error class for task synchronization.
 *
 * The code is the dispatch key: the executor retries on AUTHORIZATION only,
 * the session raises a re-auth prompt on the auth codes, everything else is
 * shown to the user as-is.
 */

export type ErrorCode =
  | 'AUTHORIZATION'
  | 'AUTH_EXPIRED'
  | 'CONFIG_MISSING'
  | 'USER_CANCELLED'
  | 'CORRUPT_STATE'
  | 'REMOTE_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'

export interface TaskSyncErrorOptions {
  /** HTTP status reported by the remote service, when there was one. */
  status?: number
  cause?: unknown
}

export class TaskSyncError extends Error {
  readonly code: ErrorCode
  readonly status: number | undefined

  constructor(code: ErrorCode, message: string, options: TaskSyncErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'TaskSyncError'
    this.code = code
    this.status = options.status
  }

  static authorization(message: string, status?: number): TaskSyncError {
    return new TaskSyncError('AUTHORIZATION', message, { status })
  }

  static authExpired(message = 'Authorization expired. Sign in again.'): TaskSyncError {
    return new TaskSyncError('AUTH_EXPIRED', message)
  }

  static configMissing(message: string): TaskSyncError {
    return new TaskSyncError('CONFIG_MISSING', message)
  }

  static userCancelled(message = 'Sign-in was cancelled'): TaskSyncError {
    return new TaskSyncError('USER_CANCELLED', message)
  }

  static corruptState(message: string): TaskSyncError {
    return new TaskSyncError('CORRUPT_STATE', message)
  }

  static remote(message: string, status?: number, cause?: unknown): TaskSyncError {
    return new TaskSyncError('REMOTE_ERROR', message, { status, cause })
  }

  static notFound(entity: string, id: string): TaskSyncError {
    return new TaskSyncError('NOT_FOUND', `${entity} not found: ${id}`, { status: 404 })
  }

  static validation(message: string): TaskSyncError {
    return new TaskSyncError('VALIDATION_ERROR', message)
  }
}

export function isTaskSyncError(e: unknown): e is TaskSyncError {
  return e instanceof TaskSyncError
}

export function isAuthorizationError(e: unknown): boolean {
  return isTaskSyncError(e) && e.code === 'AUTHORIZATION'
}

/** Codes after which only a fresh sign-in helps. */
export function requiresReauthentication(e: TaskSyncError): boolean {
  return e.code === 'AUTH_EXPIRED' || e.code === 'CONFIG_MISSING' || e.code === 'USER_CANCELLED'
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

/** Wrap anything thrown by a collaborator; TaskSyncErrors pass through untouched. */
export function toTaskSyncError(e: unknown): TaskSyncError {
  if (isTaskSyncError(e)) return e
  return TaskSyncError.remote(errorMessage(e), undefined, e)
}

import { TaskSyncError, errorMessage, isTaskSyncError } from '@taskdesk/core'

/** HTTP status from a gaxios error, read structurally. */
export function httpStatusOf(e: unknown): number | undefined {
  if (typeof e !== 'object' || e === null) return undefined
  if ('response' in e && typeof e.response === 'object' && e.response !== null && 'status' in e.response) {
    const status = e.response.status
    if (typeof status === 'number') return status
  }
  if ('status' in e && typeof e.status === 'number') return e.status
  return undefined
}

/** 401/403 mean the credential was refused; everything else is an ordinary failure. */
export function classifyGoogleError(e: unknown, action: string): TaskSyncError {
  if (isTaskSyncError(e)) return e
  const status = httpStatusOf(e)
  const message = `${action} failed: ${errorMessage(e)}`
  if (status === 401 || status === 403) return TaskSyncError.authorization(message, status)
  if (status === 404) return new TaskSyncError('NOT_FOUND', message, { status, cause: e })
  return TaskSyncError.remote(message, status, e)
}

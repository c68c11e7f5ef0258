/**
 * Common utilities — shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr } from './result.js'
export type { Result } from './result.js'

export {
  TaskSyncError,
  isTaskSyncError,
  isAuthorizationError,
  requiresReauthentication,
  toTaskSyncError,
  errorMessage,
} from './errors.js'
export type { ErrorCode, TaskSyncErrorOptions } from './errors.js'

export { RemoteIdSchema, TitleSchema, FilePathSchema } from './schemas.js'

export { GoogleTasksRemoteClient, toRemoteTask, toRemoteTaskList } from './client.js'
export { classifyGoogleError, httpStatusOf } from './errors.js'
export type { GoogleTasksClientConfig, GoogleTokens } from './types.js'

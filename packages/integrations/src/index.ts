/**
 * @taskdesk/integrations — Google Tasks binding for the sync engine.
 *
 * Provides the googleapis-backed remote task client, OAuth client config
 * loading, token refresh and the loopback sign-in flow.
 */

export { GoogleTasksRemoteClient, toRemoteTask, toRemoteTaskList } from './gtasks/index.js'
export { classifyGoogleError, httpStatusOf } from './gtasks/index.js'
export type { GoogleTasksClientConfig, GoogleTokens } from './gtasks/index.js'

export {
  loadClientConfig,
  parseClientSecrets,
  GoogleTokenRefresher,
  LoopbackOAuthFlow,
  credentialFromTokens,
} from './auth/index.js'
export type { OAuthClientConfig, LoopbackOAuthFlowOptions, CodeExchangeRequest, TokenFallback } from './auth/index.js'

export { createGoogleTaskSync } from './google-task-sync.js'
export type { GoogleTaskSyncOptions } from './google-task-sync.js'

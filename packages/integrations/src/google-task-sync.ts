/**
 * Wires the engine to Google Tasks: token.json on disk, credentials.json for
 * the OAuth client, loopback sign-in, googleapis for the calls.
 */

import { FileCredentialStore, createTaskSync } from '@taskdesk/core'
import type { TaskSync, TaskdeskConfig } from '@taskdesk/core'
import { GoogleTasksRemoteClient } from './gtasks/index.js'
import { GoogleTokenRefresher, LoopbackOAuthFlow, loadClientConfig } from './auth/index.js'
import type { LoopbackOAuthFlowOptions } from './auth/index.js'

export interface GoogleTaskSyncOptions {
  openUrl?: LoopbackOAuthFlowOptions['openUrl']
  loginHint?: string
}

export function createGoogleTaskSync(config: TaskdeskConfig, opts: GoogleTaskSyncOptions = {}): TaskSync {
  const loadConfig = () => loadClientConfig(config.clientSecretsFile)

  return createTaskSync({
    client: new GoogleTasksRemoteClient({ pageSize: config.pageSize }),
    store: new FileCredentialStore(config.tokenFile),
    refresher: new GoogleTokenRefresher(loadConfig),
    authenticator: new LoopbackOAuthFlow({
      loadConfig,
      scopes: config.scopes,
      openUrl: opts.openUrl,
      loginHint: opts.loginHint,
    }),
    requiredScopes: config.scopes,
    expirySkewMs: config.expirySkewMs,
  })
}

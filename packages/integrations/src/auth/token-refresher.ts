/**
 * Refreshes access tokens with google-auth-library's OAuth2 client.
 */

import { google } from 'googleapis'
import { TaskSyncError } from '@taskdesk/core'
import type { Credential, CredentialRefresher } from '@taskdesk/core'
import { classifyGoogleError } from '../gtasks/errors.js'
import type { OAuthClientConfig } from './client-config.js'
import { credentialFromTokens } from './tokens.js'

export class GoogleTokenRefresher implements CredentialRefresher {
  constructor(private readonly loadConfig: () => Promise<OAuthClientConfig>) {}

  async refresh(credential: Credential): Promise<Credential> {
    if (!credential.refreshToken) {
      throw TaskSyncError.authorization('No refresh token available')
    }

    const config = await this.loadConfig()
    const auth = new google.auth.OAuth2(config.clientId, config.clientSecret)
    auth.setCredentials({ refresh_token: credential.refreshToken })

    try {
      await auth.getAccessToken()
    } catch (e) {
      throw classifyGoogleError(e, 'Refreshing access token')
    }
    return credentialFromTokens(auth.credentials, credential)
  }
}

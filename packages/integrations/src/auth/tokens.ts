import { TaskSyncError } from '@taskdesk/core'
import type { Credential } from '@taskdesk/core'
import type { GoogleTokens } from '../gtasks/types.js'

export type TokenFallback = Partial<Pick<Credential, 'refreshToken' | 'scopes'>>

/**
 * Convert tokens from google-auth-library. Fields the server left out
 * (refresh token and scopes on a refresh) fall back to `previous`.
 */
export function credentialFromTokens(tokens: GoogleTokens, previous: TokenFallback = {}): Credential {
  if (!tokens.access_token) {
    throw TaskSyncError.remote('Token response did not contain an access token')
  }
  const scopes = tokens.scope?.split(/\s+/).filter(Boolean)
  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? previous.refreshToken ?? null,
    expiresAt: tokens.expiry_date ?? null,
    scopes: scopes && scopes.length > 0 ? scopes : [...(previous.scopes ?? [])],
  }
}

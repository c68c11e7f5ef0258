import type { Credential } from './schemas.js'

/** Treat a token as expired this long before its actual expiry. */
export const DEFAULT_EXPIRY_SKEW_MS = 60_000

export interface ValidityOptions {
  requiredScopes: readonly string[]
  now: number
  skewMs?: number
}

export function isExpired(credential: Credential, now: number, skewMs = DEFAULT_EXPIRY_SKEW_MS): boolean {
  if (credential.expiresAt === null) return false
  return now + skewMs >= credential.expiresAt
}

export function hasScopes(credential: Credential, requiredScopes: readonly string[]): boolean {
  const granted = new Set(credential.scopes)
  return requiredScopes.every((scope) => granted.has(scope))
}

export function isCredentialValid(credential: Credential, opts: ValidityOptions): boolean {
  return !isExpired(credential, opts.now, opts.skewMs) && hasScopes(credential, opts.requiredScopes)
}

/** Same token material, regardless of object identity. */
export function sameCredential(a: Credential, b: Credential): boolean {
  return a.accessToken === b.accessToken && a.refreshToken === b.refreshToken
}

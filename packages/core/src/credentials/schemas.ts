/**
 * Zod schemas for OAuth credentials and their persisted form.
 */

import { z } from 'zod'

export const CredentialSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).nullable(),
  /** Epoch milliseconds; null when the issuer did not say. */
  expiresAt: z.number().int().nonnegative().nullable(),
  scopes: z.array(z.string()),
})
export type Credential = z.infer<typeof CredentialSchema>

export const CREDENTIAL_BLOB_VERSION = 1

export const StoredCredentialSchema = CredentialSchema.extend({
  version: z.literal(CREDENTIAL_BLOB_VERSION),
  savedAt: z.string().datetime(),
})
export type StoredCredential = z.infer<typeof StoredCredentialSchema>

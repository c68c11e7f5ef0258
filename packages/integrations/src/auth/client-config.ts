/**
 * OAuth client configuration, read from the credentials.json downloaded from
 * the Google Cloud Console ("Desktop app" client).
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { TaskSyncError } from '@taskdesk/core'

export interface OAuthClientConfig {
  clientId: string
  clientSecret: string
  authUri: string
}

const DEFAULT_AUTH_URI = 'https://accounts.google.com/o/oauth2/v2/auth'

const ClientSectionSchema = z.object({
  client_id: z.string().min(1, 'client_id is required'),
  client_secret: z.string().min(1, 'client_secret is required'),
  auth_uri: z.string().url().optional(),
})

const ClientSecretsFileSchema = z
  .object({
    installed: ClientSectionSchema.optional(),
    web: ClientSectionSchema.optional(),
  })
  .refine((f) => f.installed !== undefined || f.web !== undefined, {
    message: 'Expected an "installed" or "web" client section',
  })

export function parseClientSecrets(json: unknown): OAuthClientConfig {
  const parsed = ClientSecretsFileSchema.safeParse(json)
  const section = parsed.success ? (parsed.data.installed ?? parsed.data.web) : undefined
  if (!parsed.success || !section) {
    const detail = parsed.success ? 'no client section' : (parsed.error.issues[0]?.message ?? 'invalid')
    throw TaskSyncError.configMissing(`OAuth client configuration is invalid: ${detail}`)
  }
  return {
    clientId: section.client_id,
    clientSecret: section.client_secret,
    authUri: section.auth_uri ?? DEFAULT_AUTH_URI,
  }
}

/** Fails with CONFIG_MISSING when the file is absent or unusable. */
export async function loadClientConfig(path: string): Promise<OAuthClientConfig> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch {
    throw TaskSyncError.configMissing(
      `${path} not found. Download the OAuth client file for a Desktop app from the Google Cloud Console.`,
    )
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    throw TaskSyncError.configMissing(`${path} is not valid JSON`)
  }
  return parseClientSecrets(json)
}

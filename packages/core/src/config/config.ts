/**
 * Environment-driven configuration: where tokens and the OAuth client file
 * live, which scopes to ask for, and paging.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { TaskSyncError, FilePathSchema } from '../common/index.js'
import { DEFAULT_EXPIRY_SKEW_MS } from '../credentials/index.js'

export const TASKS_SCOPE = 'https://www.googleapis.com/auth/tasks'

const ENV_KEYS = {
  tokenFile: 'TASKDESK_TOKEN_FILE',
  clientSecretsFile: 'TASKDESK_CLIENT_SECRETS',
  scopes: 'TASKDESK_SCOPES',
  pageSize: 'TASKDESK_PAGE_SIZE',
  expirySkewMs: 'TASKDESK_EXPIRY_SKEW_MS',
} as const

type ConfigField = keyof typeof ENV_KEYS

function isConfigField(key: unknown): key is ConfigField {
  return typeof key === 'string' && Object.hasOwn(ENV_KEYS, key)
}

export const TaskdeskConfigSchema = z.object({
  tokenFile: FilePathSchema,
  clientSecretsFile: FilePathSchema,
  scopes: z.array(z.string().url()).min(1, 'At least one scope is required'),
  pageSize: z.coerce.number().int().min(1).max(100),
  expirySkewMs: z.coerce.number().int().nonnegative(),
})
export type TaskdeskConfig = z.infer<typeof TaskdeskConfigSchema>

export function defaultConfigDir(home: string = homedir()): string {
  return join(home, '.taskdesk')
}

export function loadTaskdeskConfig(
  env: Record<string, string | undefined> = process.env,
  home: string = homedir(),
): TaskdeskConfig {
  const dir = defaultConfigDir(home)
  const scopes = env[ENV_KEYS.scopes]?.split(/\s+/).filter(Boolean)

  const parsed = TaskdeskConfigSchema.safeParse({
    tokenFile: env[ENV_KEYS.tokenFile] || join(dir, 'token.json'),
    clientSecretsFile: env[ENV_KEYS.clientSecretsFile] || join(dir, 'credentials.json'),
    scopes: scopes && scopes.length > 0 ? scopes : [TASKS_SCOPE],
    pageSize: env[ENV_KEYS.pageSize] || 100,
    expirySkewMs: env[ENV_KEYS.expirySkewMs] || DEFAULT_EXPIRY_SKEW_MS,
  })

  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path[0]
    const envKey = isConfigField(field) ? ENV_KEYS[field] : 'configuration'
    throw TaskSyncError.validation(`Invalid ${envKey}: ${issue?.message ?? 'invalid value'}`)
  }
  return parsed.data
}

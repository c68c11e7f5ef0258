import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { FileCredentialStore, TASKS_SCOPE, loadTaskdeskConfig } from '@taskdesk/core'
import { createGoogleTaskSync } from '../src/index.js'

describe('createGoogleTaskSync', () => {
  let home: string

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'taskdesk-home-'))
  })

  afterEach(async () => {
    await rm(home, { recursive: true, force: true })
  })

  it('starts unloaded and picks up the token file from the config', async () => {
    const config = loadTaskdeskConfig({}, home)
    const stored = {
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: Date.now() + 3_600_000,
      scopes: [TASKS_SCOPE],
    }
    await new FileCredentialStore(config.tokenFile).save(stored)

    const sync = createGoogleTaskSync(config)

    expect(sync.credentials.state).toBe('unloaded')
    expect(sync.model.isLoaded).toBe(false)
    await expect(sync.credentials.acquire()).resolves.toEqual(stored)
    expect(sync.credentials.state).toBe('valid')
  })

  it('reports a missing client file when sign-in is needed', async () => {
    const sync = createGoogleTaskSync(loadTaskdeskConfig({}, home))

    await expect(sync.credentials.acquire()).rejects.toMatchObject({ code: 'CONFIG_MISSING' })
    expect(sync.credentials.state).toBe('auth-failed')
  })
})

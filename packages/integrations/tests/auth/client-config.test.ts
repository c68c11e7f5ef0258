import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { loadClientConfig, parseClientSecrets } from '../../src/auth/index.js'

describe('parseClientSecrets', () => {
  it('reads an installed-app client with the default consent endpoint', () => {
    expect(parseClientSecrets({ installed: { client_id: 'client-id', client_secret: 'test-secret' } })).toEqual({
      clientId: 'client-id',
      clientSecret: 'test-secret',
      authUri: 'https://accounts.google.com/o/oauth2/v2/auth',
    })
  })

  it('accepts a web client and its own consent endpoint', () => {
    const config = parseClientSecrets({
      web: {
        client_id: 'web-id',
        client_secret: 'test-secret',
        auth_uri: 'https://auth.example.test/authorize',
        token_uri: 'https://auth.example.test/token',
      },
    })
    expect(config.authUri).toBe('https://auth.example.test/authorize')
  })

  it('rejects a file without a client section', () => {
    expect(() => parseClientSecrets({ other: {} })).toThrow(
      'OAuth client configuration is invalid: Expected an "installed" or "web" client section',
    )
  })

  it('rejects a client without a secret', () => {
    expect(() => parseClientSecrets({ installed: { client_id: 'client-id', client_secret: '' } })).toThrow(
      'OAuth client configuration is invalid: client_secret is required',
    )
  })
})

describe('loadClientConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskdesk-client-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('loads the file from disk', async () => {
    const path = join(dir, 'credentials.json')
    await writeFile(path, JSON.stringify({ installed: { client_id: 'client-id', client_secret: 'test-secret' } }))
    await expect(loadClientConfig(path)).resolves.toMatchObject({ clientId: 'client-id' })
  })

  it('reports a missing file as CONFIG_MISSING', async () => {
    const path = join(dir, 'credentials.json')
    await expect(loadClientConfig(path)).rejects.toMatchObject({
      code: 'CONFIG_MISSING',
      message: `${path} not found. Download the OAuth client file for a Desktop app from the Google Cloud Console.`,
    })
  })

  it('reports unreadable JSON as CONFIG_MISSING', async () => {
    const path = join(dir, 'credentials.json')
    await writeFile(path, '{ not json')
    await expect(loadClientConfig(path)).rejects.toMatchObject({
      code: 'CONFIG_MISSING',
      message: `${path} is not valid JSON`,
    })
  })
})

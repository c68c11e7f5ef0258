/**
 * Interactive Google sign-in via system browser + loopback server.
 *
 * Auth Code flow with PKCE. The consent URL is handed to `openUrl`; Google
 * redirects back to a temporary HTTP server bound to 127.0.0.1, which
 * exchanges the code for tokens and shuts down.
 */

import { createServer } from 'node:http'
import type { ServerResponse } from 'node:http'
import { createHash, randomBytes } from 'node:crypto'
import { google } from 'googleapis'
import { TaskSyncError, toTaskSyncError } from '@taskdesk/core'
import type { Credential, InteractiveAuthenticator } from '@taskdesk/core'
import type { GoogleTokens } from '../gtasks/types.js'
import type { OAuthClientConfig } from './client-config.js'
import { credentialFromTokens } from './tokens.js'

const CALLBACK_PATH = '/oauth2callback'
const DEFAULT_TIMEOUT_MS = 120_000

export interface CodeExchangeRequest {
  config: OAuthClientConfig
  code: string
  codeVerifier: string
  redirectUri: string
}

export interface LoopbackOAuthFlowOptions {
  loadConfig: () => Promise<OAuthClientConfig>
  scopes: readonly string[]
  /** Show the consent URL to the user; defaults to logging it. */
  openUrl?: (url: string) => void | Promise<void>
  exchangeCode?: (req: CodeExchangeRequest) => Promise<GoogleTokens>
  timeoutMs?: number
  loginHint?: string
}

async function exchangeWithGoogle(req: CodeExchangeRequest): Promise<GoogleTokens> {
  const auth = new google.auth.OAuth2(req.config.clientId, req.config.clientSecret, req.redirectUri)
  const { tokens } = await auth.getToken({
    code: req.code,
    codeVerifier: req.codeVerifier,
    redirect_uri: req.redirectUri,
  })
  return tokens
}

function logConsentUrl(url: string): void {
  console.info(`[oauth] Open this URL in your browser to sign in: ${url}`)
}

function respond(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'text/html' })
  res.end(`<html><body><p>${message}</p></body></html>`)
}

export class LoopbackOAuthFlow implements InteractiveAuthenticator {
  /** One browser round-trip at a time. */
  private inFlight: Promise<Credential> | null = null
  private readonly openUrl: (url: string) => void | Promise<void>
  private readonly exchangeCode: (req: CodeExchangeRequest) => Promise<GoogleTokens>
  private readonly timeoutMs: number

  constructor(private readonly opts: LoopbackOAuthFlowOptions) {
    this.openUrl = opts.openUrl ?? logConsentUrl
    this.exchangeCode = opts.exchangeCode ?? exchangeWithGoogle
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  authenticate(): Promise<Credential> {
    if (this.inFlight) return this.inFlight

    this.inFlight = this.run().finally(() => {
      this.inFlight = null
    })
    return this.inFlight
  }

  private async run(): Promise<Credential> {
    const config = await this.opts.loadConfig()

    const codeVerifier = randomBytes(32).toString('base64url')
    const codeChallenge = createHash('sha256').update(codeVerifier).digest('base64url')
    const state = randomBytes(16).toString('hex')

    return new Promise<Credential>((resolve, reject) => {
      let settled = false
      let timeoutHandle: ReturnType<typeof setTimeout> | undefined

      const finish = (outcome: { credential: Credential } | { error: TaskSyncError }): void => {
        if (timeoutHandle) clearTimeout(timeoutHandle)
        server.close()
        if ('credential' in outcome) resolve(outcome.credential)
        else reject(outcome.error)
      }

      const redirectUriFor = (): string => {
        const address = server.address()
        const port = typeof address === 'object' && address ? address.port : 0
        return `http://127.0.0.1:${port}${CALLBACK_PATH}`
      }

      const server = createServer((req, res) => {
        const url = new URL(req.url ?? '', 'http://127.0.0.1')
        if (url.pathname !== CALLBACK_PATH) {
          respond(res, 404, 'Not the callback path.')
          return
        }

        // Single-consume: ignore duplicate hits (favicon, retries)
        if (settled) {
          respond(res, 200, 'Already processed. You can close this tab.')
          return
        }
        settled = true

        if (url.searchParams.get('state') !== state) {
          respond(res, 400, 'Invalid state parameter. Authorization denied.')
          finish({ error: TaskSyncError.remote('OAuth state mismatch') })
          return
        }

        const error = url.searchParams.get('error')
        if (error) {
          respond(res, 200, 'Authorization was denied. You can close this tab.')
          finish({ error: TaskSyncError.userCancelled(`Sign-in was not completed: ${error}`) })
          return
        }

        const code = url.searchParams.get('code')
        if (!code) {
          respond(res, 400, 'No authorization code received.')
          finish({ error: TaskSyncError.remote('No authorization code in callback') })
          return
        }

        this.exchangeCode({ config, code, codeVerifier, redirectUri: redirectUriFor() })
          .then((tokens) => {
            const credential = credentialFromTokens(tokens, { scopes: [...this.opts.scopes] })
            respond(res, 200, 'Signed in successfully! You can close this tab.')
            finish({ credential })
          })
          .catch((e: unknown) => {
            respond(res, 500, 'Token exchange failed. You can close this tab.')
            finish({ error: toTaskSyncError(e) })
          })
      })

      server.on('error', (e) => {
        if (settled) return
        settled = true
        finish({ error: toTaskSyncError(e) })
      })

      // Bind to loopback only (not 0.0.0.0)
      server.listen(0, '127.0.0.1', () => {
        const authUrl = new URL(config.authUri)
        authUrl.searchParams.set('client_id', config.clientId)
        authUrl.searchParams.set('redirect_uri', redirectUriFor())
        authUrl.searchParams.set('response_type', 'code')
        authUrl.searchParams.set('scope', this.opts.scopes.join(' '))
        authUrl.searchParams.set('access_type', 'offline')
        authUrl.searchParams.set('prompt', 'consent')
        authUrl.searchParams.set('code_challenge', codeChallenge)
        authUrl.searchParams.set('code_challenge_method', 'S256')
        authUrl.searchParams.set('state', state)
        if (this.opts.loginHint) authUrl.searchParams.set('login_hint', this.opts.loginHint)

        Promise.resolve(this.openUrl(authUrl.toString())).catch((e: unknown) => {
          if (settled) return
          settled = true
          finish({ error: toTaskSyncError(e) })
        })
      })

      timeoutHandle = setTimeout(() => {
        if (settled) return
        settled = true
        finish({ error: TaskSyncError.userCancelled(`Sign-in timed out after ${Math.round(this.timeoutMs / 1000)} seconds`) })
      }, this.timeoutMs)
    })
  }
}

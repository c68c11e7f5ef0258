export { loadClientConfig, parseClientSecrets } from './client-config.js'
export type { OAuthClientConfig } from './client-config.js'
export { GoogleTokenRefresher } from './token-refresher.js'
export { LoopbackOAuthFlow } from './loopback-flow.js'
export type { LoopbackOAuthFlowOptions, CodeExchangeRequest } from './loopback-flow.js'
export { credentialFromTokens } from './tokens.js'
export type { TokenFallback } from './tokens.js'

export { CredentialSchema, StoredCredentialSchema, CREDENTIAL_BLOB_VERSION } from './schemas.js'
export type { Credential, StoredCredential } from './schemas.js'

export { DEFAULT_EXPIRY_SKEW_MS, isExpired, hasScopes, isCredentialValid, sameCredential } from './credential.js'
export type { ValidityOptions } from './credential.js'

export { MemoryCredentialStore } from './store.js'
export type { CredentialStore } from './store.js'
export { FileCredentialStore } from './file-store.js'

export { CredentialLifecycleManager } from './lifecycle.js'
export type {
  CredentialState,
  CredentialRefresher,
  InteractiveAuthenticator,
  CredentialManagerOptions,
  CredentialStateListener,
} from './lifecycle.js'

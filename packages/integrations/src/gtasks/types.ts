/**
 * Google Tasks-specific types for the remote client binding.
 */

export interface GoogleTasksClientConfig {
  /** Page size for list calls; the API caps it at 100. */
  pageSize?: number
}

/** Token fields as google-auth-library reports them. */
export interface GoogleTokens {
  access_token?: string | null
  refresh_token?: string | null
  expiry_date?: number | null
  scope?: string | null
}

/** Internal client context shared by all tracker API functions. */
export interface TrackerClientContext {
  /** Resolves the API token on first use. */
  getToken(): Promise<undefined | string>

  /** Scheduled time when rate limit resets. */
  rateLimitReset: Date

  /** REST API base URL. */
  baseUrl: string

  /** Repository owner. */
  owner: string

  /** Repository name. */
  repo: string
}

/**
 * Source of bearer tokens for Google API requests.
 * Allows testing the HTTP layer without real credentials.
 */
export interface TokenProvider {
  /** Return a valid access token, refreshing it when needed */
  getAccessToken(): Promise<string>;
}

/**
 * OAuth2 Token Response
 * Body returned by the Spotify accounts token endpoint
 */
export interface TokenResponse {
  access_token: string;
  token_type: string;
  scope?: string;
  expires_in: number;
  /** Present on code exchange; only sometimes present on refresh */
  refresh_token?: string;
}

/**
 * Cached Token with expiry
 */
export interface CachedToken {
  accessToken: string;
  expiresAt: number; // Unix timestamp (ms)
}

/**
 * Where the auth service reads and writes credential state
 */
export interface CredentialStore {
  getClientId(): string | undefined;
  getClientSecret(): string | undefined;
  getRedirectUri(): string;
  getRefreshToken(): string | undefined;
  getCachedToken(): CachedToken | null;
  getAuthorizationCode(): string | undefined;
  saveTokens(token: CachedToken, refreshToken?: string): void;
  /** Drops a pending authorization code that cannot be exchanged anymore */
  clearAuthorizationCode(): void;
  clearTokens(): void;
}

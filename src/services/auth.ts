/**
 * Auth Service
 * Spotify OAuth2 authorization-code flow: code exchange, lazy refresh, invalidation.
 */

import { ofetch, FetchError } from 'ofetch';
import type { TokenResponse, CachedToken, CredentialStore } from '../types/auth.js';
import { AuthError, MissingCredentialsError, NetworkError, NotAuthenticatedError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export const AUTHORIZE_ENDPOINT = 'https://accounts.spotify.com/authorize';
export const TOKEN_ENDPOINT = 'https://accounts.spotify.com/api/token';

export const SCOPES = [
  'user-read-playback-state',
  'user-modify-playback-state',
  'user-read-currently-playing',
  // product (premium/free) of GET /me
  'user-read-private',
];

// Tokens are treated as expired 60 seconds early
const TOKEN_EXPIRY_BUFFER_MS = 60 * 1000;

export class SpotifyAuthService {
  private store: CredentialStore;
  private cachedToken: CachedToken | null;

  // Single flight: concurrent callers wait for the same token request
  private inFlightTokenPromise: Promise<string> | null = null;

  constructor(store: CredentialStore) {
    this.store = store;
    this.cachedToken = store.getCachedToken();
  }

  /**
   * URL of the Spotify consent page
   */
  buildAuthorizeUrl(state?: string): string {
    const params = new URLSearchParams({
      response_type: 'code',
      client_id: this.requireCredentials().clientId,
      redirect_uri: this.store.getRedirectUri(),
      scope: SCOPES.join(' '),
    });
    if (state) {
      params.set('state', state);
    }
    return `${AUTHORIZE_ENDPOINT}?${params.toString()}`;
  }

  /**
   * Returns a valid access token
   * - cached token still valid: returned as is
   * - a token request in flight: its result is shared
   * - otherwise: refresh, or exchange a pending authorization code
   */
  async getToken(): Promise<string> {
    if (this.cachedToken && this.isTokenValid()) {
      return this.cachedToken.accessToken;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    this.inFlightTokenPromise = this.obtainToken();

    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  private async obtainToken(): Promise<string> {
    if (this.store.getRefreshToken()) {
      const token = await this.refresh();
      return token.accessToken;
    }

    const code = this.store.getAuthorizationCode();
    if (code) {
      const token = await this.exchangeCode(code);
      return token.accessToken;
    }

    throw new NotAuthenticatedError('Not logged in to Spotify, run the login flow first');
  }

  /**
   * Exchanges an authorization code for an access/refresh token pair
   */
  async exchangeCode(code: string): Promise<CachedToken> {
    let response: TokenResponse;
    try {
      response = await this.requestToken({
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.store.getRedirectUri(),
      });
    } catch (error) {
      if (error instanceof AuthError && error.oauthError === 'invalid_grant') {
        // used or expired code
        loggers.auth.warn('Authorization code rejected');
        if (this.store.getAuthorizationCode() === code) {
          this.store.clearAuthorizationCode();
        }
        throw new NotAuthenticatedError('Spotify authorization code expired, log in again');
      }
      throw error;
    }

    if (!response.refresh_token) {
      throw new AuthError('Token response did not include a refresh token');
    }

    const token = this.cacheResponse(response);
    this.store.saveTokens(token, response.refresh_token);
    loggers.auth.info('Authorization code exchanged', { expiresIn: response.expires_in });
    return token;
  }

  /**
   * Refresh-token grant. Spotify may rotate the refresh token; the old one is
   * kept when the response carries none.
   */
  async refresh(): Promise<CachedToken> {
    const refreshToken = this.store.getRefreshToken();
    if (!refreshToken) {
      throw new NotAuthenticatedError();
    }

    let response: TokenResponse;
    try {
      response = await this.requestToken({
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
      });
    } catch (error) {
      if (error instanceof AuthError && error.oauthError === 'invalid_grant') {
        // revoked or expired grant: it will never work again
        loggers.auth.warn('Refresh token rejected, clearing stored grant');
        this.cachedToken = null;
        this.store.clearTokens();
        throw new NotAuthenticatedError('Spotify login expired, log in again');
      }
      throw error;
    }

    const token = this.cacheResponse(response);
    this.store.saveTokens(token, response.refresh_token);
    loggers.auth.info('Access token refreshed', {
      expiresIn: response.expires_in,
      rotated: Boolean(response.refresh_token),
    });
    return token;
  }

  /**
   * Drops the cached access token (after a 401); the refresh token stays.
   * With `rejectedToken`, a token obtained since then is kept.
   */
  invalidate(rejectedToken?: string): void {
    if (rejectedToken !== undefined && this.cachedToken?.accessToken !== rejectedToken) {
      return;
    }
    this.cachedToken = null;
  }

  /**
   * Forgets every token, persisted ones included
   */
  logout(): void {
    this.cachedToken = null;
    this.store.clearTokens();
    loggers.auth.info('Logged out');
  }

  isTokenValid(): boolean {
    if (!this.cachedToken) {
      return false;
    }
    return Date.now() < this.cachedToken.expiresAt;
  }

  /**
   * Whether a grant exists that can produce tokens without user interaction
   */
  isAuthenticated(): boolean {
    return Boolean(this.store.getRefreshToken() || this.store.getAuthorizationCode());
  }

  getTokenExpiry(): number | null {
    return this.cachedToken ? this.cachedToken.expiresAt : null;
  }

  hasInflightRequest(): boolean {
    return this.inFlightTokenPromise !== null;
  }

  private cacheResponse(response: TokenResponse): CachedToken {
    this.cachedToken = {
      accessToken: response.access_token,
      expiresAt: Date.now() + response.expires_in * 1000 - TOKEN_EXPIRY_BUFFER_MS,
    };
    return this.cachedToken;
  }

  private requireCredentials(): { clientId: string; clientSecret: string } {
    const clientId = this.store.getClientId();
    const clientSecret = this.store.getClientSecret();
    if (!clientId || !clientSecret) {
      throw new MissingCredentialsError();
    }
    return { clientId, clientSecret };
  }

  private async requestToken(params: Record<string, string>): Promise<TokenResponse> {
    const { clientId, clientSecret } = this.requireCredentials();
    const basic = Buffer.from(`${clientId}:${clientSecret}`, 'utf-8').toString('base64');
    const body = new URLSearchParams(params).toString();

    let response: unknown;
    try {
      response = await ofetch<unknown>(TOKEN_ENDPOINT, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: `Basic ${basic}`,
        },
        body,
      });
    } catch (error) {
      throw toAuthError(error, params.grant_type);
    }

    if (!isTokenResponse(response)) {
      throw new AuthError('Malformed token response from Spotify');
    }
    return response;
  }
}

function isTokenResponse(value: unknown): value is TokenResponse {
  if (!value || typeof value !== 'object') {
    return false;
  }
  return (
    'access_token' in value &&
    typeof value.access_token === 'string' &&
    'expires_in' in value &&
    typeof value.expires_in === 'number'
  );
}

function toAuthError(error: unknown, grantType: string | undefined): Error {
  if (error instanceof FetchError) {
    const status = error.statusCode ?? error.status;
    if (status === undefined) {
      return new NetworkError(`Could not reach the Spotify token endpoint: ${error.message}`, error);
    }

    const data: unknown = error.data;
    let oauthError: string | undefined;
    let description: string | undefined;
    if (data && typeof data === 'object') {
      if ('error' in data && typeof data.error === 'string') {
        oauthError = data.error;
      }
      if ('error_description' in data && typeof data.error_description === 'string') {
        description = data.error_description;
      }
    }

    const message = `Token request (${grantType ?? 'unknown grant'}) failed with ${status}` +
      (description ? `: ${description}` : oauthError ? `: ${oauthError}` : '');
    return new AuthError(message, oauthError, status, error);
  }

  if (error instanceof Error) {
    return new NetworkError(`Could not reach the Spotify token endpoint: ${error.message}`, error);
  }
  return new NetworkError(String(error));
}

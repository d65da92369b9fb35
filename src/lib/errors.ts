/**
 * Error types
 * Every error the plugin raises carries a stable `code`, used for JSON output,
 * CLI exit codes and host notices.
 */

import type { HostNotice } from '../types/host.js';

export type ErrorCode =
  | 'MISSING_CREDENTIALS'
  | 'NOT_AUTHENTICATED'
  | 'AUTH_FAILED'
  | 'PREMIUM_REQUIRED'
  | 'NO_ACTIVE_DEVICE'
  | 'RATE_LIMITED'
  | 'SPOTIFY_API_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_ARGUMENT';

export class PluginError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PluginError';
    this.code = code;
  }
}

/**
 * Client ID or Client Secret is not configured
 */
export class MissingCredentialsError extends PluginError {
  constructor() {
    super('MISSING_CREDENTIALS', 'Spotify Client ID and Client Secret are not configured');
    this.name = 'MissingCredentialsError';
  }
}

/**
 * No usable grant: the user has to log in (again)
 */
export class NotAuthenticatedError extends PluginError {
  constructor(message = 'Not logged in to Spotify') {
    super('NOT_AUTHENTICATED', message);
    this.name = 'NotAuthenticatedError';
  }
}

/**
 * The token endpoint rejected a code exchange or refresh
 */
export class AuthError extends PluginError {
  /** OAuth error code, e.g. invalid_grant */
  public readonly oauthError?: string;
  public readonly status?: number;

  constructor(message: string, oauthError?: string, status?: number, cause?: unknown) {
    super('AUTH_FAILED', message, { cause });
    this.name = 'AuthError';
    this.oauthError = oauthError;
    this.status = status;
  }
}

/**
 * Non-success answer of the Web API
 */
export class SpotifyApiError extends PluginError {
  public readonly status: number;
  /** Spotify's `reason` field, when present */
  public readonly reason?: string;

  constructor(status: number, message: string, reason?: string, code: ErrorCode = 'SPOTIFY_API_ERROR') {
    super(code, message);
    this.name = 'SpotifyApiError';
    this.status = status;
    this.reason = reason;
  }
}

/**
 * Playback control needs a Spotify Premium account
 */
export class PremiumRequiredError extends SpotifyApiError {
  constructor(message = 'Spotify Premium is required for playback control') {
    super(403, message, 'PREMIUM_REQUIRED', 'PREMIUM_REQUIRED');
    this.name = 'PremiumRequiredError';
  }
}

export class NoActiveDeviceError extends SpotifyApiError {
  constructor(message = 'No active Spotify device found') {
    super(404, message, 'NO_ACTIVE_DEVICE', 'NO_ACTIVE_DEVICE');
    this.name = 'NoActiveDeviceError';
  }
}

export class RateLimitedError extends SpotifyApiError {
  /** Seconds, from the Retry-After header */
  public readonly retryAfter?: number;

  constructor(retryAfter?: number) {
    super(
      429,
      retryAfter !== undefined
        ? `Rate limited by Spotify, retry after ${retryAfter} seconds`
        : 'Rate limited by Spotify',
      undefined,
      'RATE_LIMITED'
    );
    this.name = 'RateLimitedError';
    this.retryAfter = retryAfter;
  }
}

/**
 * The request never got an HTTP answer
 */
export class NetworkError extends PluginError {
  constructor(message: string, cause?: unknown) {
    super('NETWORK_ERROR', message, { cause });
    this.name = 'NetworkError';
  }
}

export class InvalidArgumentError extends PluginError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string {
  return error instanceof PluginError ? error.code : 'UNKNOWN_ERROR';
}

/**
 * Maps an error to the notice shown by the host
 */
export function toNotice(error: unknown): HostNotice {
  if (error instanceof PremiumRequiredError) {
    return {
      kind: 'premium-required',
      title: 'Spotify Premium required',
      message: error.message,
      code: error.code,
    };
  }
  if (error instanceof NotAuthenticatedError || error instanceof MissingCredentialsError) {
    return {
      kind: 'not-authenticated',
      title: 'Spotify login required',
      message: error.message,
      code: error.code,
    };
  }
  if (error instanceof NoActiveDeviceError) {
    return {
      kind: 'no-active-device',
      title: 'No active device',
      message: 'Start Spotify on a device or pick one with the device button',
      code: error.code,
    };
  }
  return {
    kind: 'error',
    title: 'Spotify request failed',
    message: errorMessage(error),
    code: errorCode(error),
  };
}

/**
 * CLI exit code: 1 usage/config, 2 Spotify/API, 3 not authenticated
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof NotAuthenticatedError || error instanceof AuthError) {
    return 3;
  }
  if (error instanceof MissingCredentialsError || error instanceof InvalidArgumentError) {
    return 1;
  }
  return 2;
}

/**
 * Spotify API Client
 * One method per Web API endpoint the plugin uses. Requests carry the bearer
 * token of the auth service; a 401 invalidates it and the request is sent once
 * more with a refreshed token.
 */

import { ofetch, FetchError } from 'ofetch';
import { retry } from './retry.js';
import { loggers } from '../lib/logger.js';
import {
  NetworkError,
  NoActiveDeviceError,
  PluginError,
  PremiumRequiredError,
  RateLimitedError,
  SpotifyApiError,
} from '../lib/errors.js';
import type {
  Device,
  DevicesResponse,
  PlaybackState,
  RepeatState,
  UserProfile,
} from '../types/api.js';

export const API_BASE = 'https://api.spotify.com/v1';

/**
 * The part of the auth service the client needs
 */
export interface TokenProvider {
  getToken(): Promise<string>;
  /** Drops the cached token if it is still `rejectedToken` */
  invalidate(rejectedToken?: string): void;
}

type HttpMethod = 'GET' | 'PUT' | 'POST';

export interface RequestOptions {
  query?: Record<string, string | number | boolean>;
  body?: Record<string, unknown>;
}

export class SpotifyApiClient {
  private auth: TokenProvider;

  constructor(auth: TokenProvider) {
    this.auth = auth;
  }

  /**
   * GET /me/player
   * @returns null when nothing is playing on any device (204)
   */
  async getPlaybackState(): Promise<PlaybackState | null> {
    const state = await this.request<PlaybackState | undefined>('GET', '/me/player');
    return state && typeof state === 'object' ? state : null;
  }

  async getDevices(): Promise<Device[]> {
    const response = await this.request<DevicesResponse | undefined>('GET', '/me/player/devices');
    return response?.devices ?? [];
  }

  async getCurrentUser(): Promise<UserProfile> {
    const profile = await this.request<UserProfile | undefined>('GET', '/me');
    if (!profile) {
      throw new SpotifyApiError(204, 'Empty profile response');
    }
    return profile;
  }

  async play(deviceId?: string): Promise<void> {
    await this.request('PUT', '/me/player/play', deviceId ? { query: { device_id: deviceId } } : {});
  }

  async pause(): Promise<void> {
    await this.request('PUT', '/me/player/pause');
  }

  async next(): Promise<void> {
    await this.request('POST', '/me/player/next');
  }

  async previous(): Promise<void> {
    await this.request('POST', '/me/player/previous');
  }

  async setShuffle(state: boolean): Promise<void> {
    await this.request('PUT', '/me/player/shuffle', { query: { state } });
  }

  async setRepeat(mode: RepeatState): Promise<void> {
    await this.request('PUT', '/me/player/repeat', { query: { state: mode } });
  }

  /**
   * @param percent clamped to 0-100 and rounded
   */
  async setVolume(percent: number): Promise<number> {
    const volume = clampVolume(percent);
    await this.request('PUT', '/me/player/volume', { query: { volume_percent: volume } });
    return volume;
  }

  async transferPlayback(deviceId: string, play: boolean): Promise<void> {
    await this.request('PUT', '/me/player', { body: { device_ids: [deviceId], play } });
  }

  /**
   * Downloads an image (album art); CDN URLs need no token
   */
  async fetchImage(url: string): Promise<Uint8Array> {
    try {
      const buffer = await ofetch(url, { responseType: 'arrayBuffer' });
      return new Uint8Array(buffer);
    } catch (error) {
      throw toSpotifyError(error);
    }
  }

  /**
   * Authenticated request against the Web API
   */
  async request<T = unknown>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const url = `${API_BASE}${path}`;
    const startTime = Date.now();

    loggers.api.debug('API request started', { method, url, query: options.query });

    let token: string | undefined;
    try {
      const result = await retry(
        async () => {
          token = await this.auth.getToken();
          return await ofetch<T>(url, {
            method,
            headers: { Authorization: `Bearer ${token}` },
            query: options.query,
            body: options.body,
          });
        },
        {
          maxRetries: 1,
          shouldRetry: (error) => statusOf(error) === 401,
          onRetry: () => {
            loggers.api.info('Access token rejected, refreshing', { method, url, statusCode: 401 });
            this.auth.invalidate(token);
          },
        }
      );

      loggers.api.debug('API request completed', { method, url, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      const mapped = toSpotifyError(error);
      loggers.api.warn('API request failed', {
        method,
        url,
        duration: Date.now() - startTime,
        statusCode: statusOf(error),
        code: mapped instanceof PluginError ? mapped.code : undefined,
      });
      throw mapped;
    }
  }
}

export function clampVolume(percent: number): number {
  if (!Number.isFinite(percent)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(percent)));
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof FetchError) {
    return error.statusCode ?? error.status;
  }
  return undefined;
}

/**
 * Reads `{ error: { message, reason } }` out of an error response body
 */
function readErrorBody(data: unknown): { message?: string; reason?: string } {
  if (!data || typeof data !== 'object' || !('error' in data)) {
    return {};
  }
  const inner = data.error;
  if (typeof inner === 'string') {
    return { message: inner };
  }
  if (!inner || typeof inner !== 'object') {
    return {};
  }
  return {
    message: 'message' in inner && typeof inner.message === 'string' ? inner.message : undefined,
    reason: 'reason' in inner && typeof inner.reason === 'string' ? inner.reason : undefined,
  };
}

/**
 * Maps ofetch failures to plugin errors; plugin errors pass through
 */
export function toSpotifyError(error: unknown): Error {
  if (error instanceof PluginError) {
    return error;
  }

  if (error instanceof FetchError) {
    const status = statusOf(error);
    if (status === undefined) {
      return new NetworkError(`Could not reach Spotify: ${error.message}`, error);
    }

    const { message, reason } = readErrorBody(error.data);
    const text = message ?? error.statusText ?? `HTTP ${status}`;

    if (status === 403 && (reason === 'PREMIUM_REQUIRED' || /premium/i.test(text))) {
      return new PremiumRequiredError(message);
    }
    if (status === 404 && (reason === 'NO_ACTIVE_DEVICE' || /no active device/i.test(text))) {
      return new NoActiveDeviceError(message);
    }
    if (status === 429) {
      const header = error.response?.headers.get('retry-after');
      const retryAfter = header ? Number.parseInt(header, 10) : NaN;
      return new RateLimitedError(Number.isFinite(retryAfter) ? retryAfter : undefined);
    }
    return new SpotifyApiError(status, `Spotify API error ${status}: ${text}`, reason);
  }

  if (error instanceof Error) {
    return new NetworkError(`Could not reach Spotify: ${error.message}`, error);
  }
  return new NetworkError(String(error));
}

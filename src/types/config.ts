import type { LogLevel } from '../lib/logger.js';

/**
 * Persisted plugin settings
 */
export interface PluginSettings {
  /** Spotify application Client ID */
  clientId?: string;
  /** Spotify application Client Secret */
  clientSecret?: string;
  /** Redirect URI registered with the Spotify application */
  redirectUri?: string;
  /** Authorization code waiting to be exchanged */
  authorizationCode?: string;
  refreshToken?: string;
  accessToken?: string;
  /** Unix timestamp (ms) */
  expiresAt?: number;
  /** Playback polling interval (seconds) */
  pollInterval?: number;
  logLevel?: LogLevel;
}

/**
 * Settings key
 */
export type ConfigKey = keyof PluginSettings;

/**
 * Storage the settings live in: a JSON file for the CLI, the host's own store otherwise
 */
export interface SettingsBackend {
  read(): PluginSettings;
  write(settings: PluginSettings): void;
  /** Human readable location, for `config path` */
  describe(): string;
}

/**
 * Config Service
 * Plugin settings with environment overrides, persisted through a SettingsBackend.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { PluginSettings, ConfigKey, SettingsBackend } from '../types/config.js';
import type { CachedToken, CredentialStore } from '../types/auth.js';
import { isLogLevel, loggers, type LogLevel } from '../lib/logger.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'spotify-deck');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_REDIRECT_URI = 'http://127.0.0.1:8888/callback';
export const DEFAULT_POLL_INTERVAL = 5;
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const STRING_KEYS = [
  'clientId',
  'clientSecret',
  'redirectUri',
  'authorizationCode',
  'refreshToken',
  'accessToken',
] as const;

function field(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

/**
 * Keeps the known keys of a parsed settings object, dropping values of the wrong type
 */
export function normalizeSettings(raw: unknown): PluginSettings {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return {};
  }

  const settings: PluginSettings = {};

  for (const key of STRING_KEYS) {
    const value = field(raw, key);
    if (typeof value === 'string' && value.length > 0) {
      settings[key] = value;
    }
  }

  if ('expiresAt' in raw && typeof raw.expiresAt === 'number' && Number.isFinite(raw.expiresAt)) {
    settings.expiresAt = raw.expiresAt;
  }

  if ('pollInterval' in raw && typeof raw.pollInterval === 'number' && Number.isFinite(raw.pollInterval)) {
    settings.pollInterval = raw.pollInterval;
  }

  if ('logLevel' in raw && isLogLevel(raw.logLevel)) {
    settings.logLevel = raw.logLevel;
  }

  return settings;
}

/**
 * Settings stored as a JSON file
 */
export class FileSettingsBackend implements SettingsBackend {
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath =
      configPath ||
      process.env.SPOTIFY_DECK_CONFIG ||
      path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
  }

  read(): PluginSettings {
    try {
      if (fs.existsSync(this.configPath)) {
        const content = fs.readFileSync(this.configPath, 'utf-8');
        return normalizeSettings(JSON.parse(content));
      }
    } catch (error) {
      loggers.plugin.warn('Settings file unreadable, starting from empty settings', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return {};
  }

  write(settings: PluginSettings): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    // tokens live in this file
    fs.writeFileSync(this.configPath, JSON.stringify(settings, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  describe(): string {
    return this.configPath;
  }
}

/**
 * Settings kept in memory only
 */
export class MemorySettingsBackend implements SettingsBackend {
  private settings: PluginSettings;

  constructor(initial: PluginSettings = {}) {
    this.settings = { ...initial };
  }

  read(): PluginSettings {
    return { ...this.settings };
  }

  write(settings: PluginSettings): void {
    this.settings = { ...settings };
  }

  describe(): string {
    return 'memory';
  }
}

export class ConfigService implements CredentialStore {
  private backend: SettingsBackend;
  private config: PluginSettings;

  constructor(backend: SettingsBackend = new FileSettingsBackend()) {
    this.backend = backend;
    this.config = this.backend.read();
  }

  private save(): void {
    this.backend.write(this.config);
  }

  get<K extends ConfigKey>(key: K): PluginSettings[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: PluginSettings[K]): void {
    this.config[key] = value;
    this.save();
  }

  /**
   * Applies several values with a single write
   */
  update(values: Partial<PluginSettings>): void {
    // undefined values are dropped when the backend serializes
    this.config = { ...this.config, ...values };
    this.save();
  }

  getAll(): PluginSettings {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.backend.describe();
  }

  /**
   * Client ID (environment first)
   */
  getClientId(): string | undefined {
    const envValue = process.env.SPOTIFY_CLIENT_ID;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.clientId;
  }

  /**
   * Client Secret (environment first)
   */
  getClientSecret(): string | undefined {
    const envValue = process.env.SPOTIFY_CLIENT_SECRET;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.clientSecret;
  }

  hasCredentials(): boolean {
    return Boolean(this.getClientId() && this.getClientSecret());
  }

  getRedirectUri(): string {
    return this.config.redirectUri || DEFAULT_REDIRECT_URI;
  }

  getPollInterval(): number {
    const interval = this.config.pollInterval;
    if (typeof interval !== 'number' || !Number.isFinite(interval)) {
      return DEFAULT_POLL_INTERVAL;
    }
    return Math.max(1, interval);
  }

  getLogLevel(): LogLevel {
    const envValue = process.env.SPOTIFY_DECK_LOG_LEVEL;
    if (isLogLevel(envValue)) {
      return envValue;
    }
    return isLogLevel(this.config.logLevel) ? this.config.logLevel : DEFAULT_LOG_LEVEL;
  }

  getAuthorizationCode(): string | undefined {
    return this.config.authorizationCode || undefined;
  }

  getRefreshToken(): string | undefined {
    return this.config.refreshToken || undefined;
  }

  getCachedToken(): CachedToken | null {
    const { accessToken, expiresAt } = this.config;
    if (!accessToken || typeof expiresAt !== 'number') {
      return null;
    }
    return { accessToken, expiresAt };
  }

  /**
   * Stores a fresh access token; a new refresh token replaces the old one.
   * A pending authorization code is single-use and is dropped.
   */
  saveTokens(token: CachedToken, refreshToken?: string): void {
    this.update({
      accessToken: token.accessToken,
      expiresAt: token.expiresAt,
      refreshToken: refreshToken ?? this.config.refreshToken,
      authorizationCode: undefined,
    });
  }

  clearAuthorizationCode(): void {
    this.update({ authorizationCode: undefined });
  }

  clearTokens(): void {
    this.update({
      accessToken: undefined,
      expiresAt: undefined,
      refreshToken: undefined,
      authorizationCode: undefined,
    });
  }
}

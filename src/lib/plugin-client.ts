/**
 * Plugin Client Helper
 * Shared SpotifyPlugin on a ConsoleHost for the CLI commands
 */

import { SpotifyPlugin } from '../plugin.js';
import { ConsoleHost } from '../host/console-host.js';
import { setLogLevel, type LogLevel } from './logger.js';

let cached: { plugin: SpotifyPlugin; host: ConsoleHost } | null = null;
let logLevelOverride: LogLevel | null = null;

/**
 * Log level from the command line; wins over the configured one
 */
export function setCliLogLevel(level: LogLevel | null): void {
  logLevelOverride = level;
  if (level) {
    setLogLevel(level);
  }
}

export function getSession(): { plugin: SpotifyPlugin; host: ConsoleHost } {
  if (!cached) {
    const host = new ConsoleHost();
    const plugin = new SpotifyPlugin(host);
    plugin.register();
    cached = { plugin, host };
  }
  if (logLevelOverride) {
    setLogLevel(logLevelOverride);
  }
  return cached;
}

export function getPlugin(): SpotifyPlugin {
  return getSession().plugin;
}

/**
 * Drops the cached plugin (tests, config changes)
 */
export function clearPluginCache(): void {
  cached?.plugin.dispose();
  cached = null;
}

/**
 * Config Command
 * Reads and writes the plugin settings file
 */

import { Command } from 'commander';
import { getPlugin } from '../lib/plugin-client.js';
import { maskSecret, printKeyValueTable, printSuccess, runCommand } from '../lib/output.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { isLogLevel, LOG_LEVELS } from '../lib/logger.js';
import type { ConfigKey, PluginSettings } from '../types/config.js';

/** Keys the user may set by hand */
export const SETTABLE_KEYS = ['clientId', 'clientSecret', 'redirectUri', 'pollInterval', 'logLevel'] as const;
export type SettableKey = (typeof SETTABLE_KEYS)[number];

const CONFIG_KEYS: readonly ConfigKey[] = [
  'clientId',
  'clientSecret',
  'redirectUri',
  'authorizationCode',
  'refreshToken',
  'accessToken',
  'expiresAt',
  'pollInterval',
  'logLevel',
];

const SECRET_KEYS: readonly ConfigKey[] = ['clientSecret', 'authorizationCode', 'refreshToken', 'accessToken'];

function isSettableKey(key: string): key is SettableKey {
  return SETTABLE_KEYS.some((settable) => settable === key);
}

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

/**
 * Turns `config set` input into a settings patch
 */
export function parseSetting(key: string, value: string): Partial<PluginSettings> {
  if (!isSettableKey(key)) {
    throw new InvalidArgumentError(`Unknown setting "${key}", expected one of ${SETTABLE_KEYS.join(', ')}`);
  }

  switch (key) {
    case 'pollInterval': {
      const seconds = Number(value);
      if (!Number.isFinite(seconds) || seconds < 1) {
        throw new InvalidArgumentError('pollInterval must be a number of seconds, at least 1');
      }
      return { pollInterval: seconds };
    }
    case 'logLevel':
      if (!isLogLevel(value)) {
        throw new InvalidArgumentError(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
      }
      return { logLevel: value };
    case 'redirectUri':
      try {
        new URL(value);
      } catch {
        throw new InvalidArgumentError(`redirectUri is not a valid URL: ${value}`);
      }
      return { redirectUri: value };
    case 'clientId':
      return { clientId: requireValue(key, value) };
    case 'clientSecret':
      return { clientSecret: requireValue(key, value) };
  }
}

function requireValue(key: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidArgumentError(`${key} must not be empty`);
  }
  return trimmed;
}

/**
 * Settings with secrets masked
 */
export function maskedSettings(settings: PluginSettings): Record<string, string | number> {
  const result: Record<string, string | number> = {};
  for (const key of CONFIG_KEYS) {
    const value = settings[key];
    if (value === undefined) {
      continue;
    }
    result[key] = typeof value === 'string' && SECRET_KEYS.includes(key) ? maskSecret(value) : value;
  }
  return result;
}

export function createConfigCommand(): Command {
  const configCommand = new Command('config').description('Manage plugin settings');

  configCommand
    .command('set <key> <value>')
    .description(`Set a value (${SETTABLE_KEYS.join(', ')})`)
    .action(async (key: string, value: string, _options: unknown, cmd: Command) => {
      await runCommand(cmd, ({ format }) => {
        const patch = parseSetting(key, value);
        getPlugin().updateSettings(patch);
        const [saved] = Object.values(patch);
        const shown = key === 'clientSecret' ? maskSecret(String(saved)) : saved;
        printSuccess(format, { key, value: shown }, () => {
          console.log(`${key} saved`);
        });
      });
    });

  configCommand
    .command('get <key>')
    .description('Print one value')
    .action(async (key: string, _options: unknown, cmd: Command) => {
      await runCommand(cmd, ({ format }) => {
        if (!isConfigKey(key)) {
          throw new InvalidArgumentError(`Unknown setting "${key}"`);
        }
        const value = getPlugin().config.get(key) ?? null;
        printSuccess(format, { key, value }, () => {
          console.log(value === null ? '' : String(value));
        });
      });
    });

  configCommand
    .command('show')
    .description('Print all settings, secrets masked')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, ({ format }) => {
        const config = getPlugin().config;
        const settings = maskedSettings(config.getAll());
        const path = config.getConfigPath();
        printSuccess(format, { path, settings }, () => {
          printKeyValueTable(Object.entries(settings).map(([key, value]) => [key, String(value)]));
          console.log(`\n${path}`);
        });
      });
    });

  configCommand
    .command('clear')
    .description('Delete all settings, including the login')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, ({ format }) => {
        const plugin = getPlugin();
        plugin.logout();
        plugin.config.clear();
        printSuccess(format, { cleared: true }, () => {
          console.log('Settings cleared');
        });
      });
    });

  configCommand
    .command('path')
    .description('Print where settings are stored')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, ({ format }) => {
        const path = getPlugin().config.getConfigPath();
        printSuccess(format, { path }, () => {
          console.log(path);
        });
      });
    });

  return configCommand;
}

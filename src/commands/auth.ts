/**
 * Auth Command
 * Spotify login through the authorization-code flow
 */

import { Command } from 'commander';
import open from 'open';
import { getPlugin } from '../lib/plugin-client.js';
import { printKeyValueTable, printSuccess, runCommand } from '../lib/output.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { createState, LoginServer, parseAuthorizationRedirect } from '../services/login.js';

/**
 * Accepts a bare code or the whole redirect URL
 */
export function extractCode(input: string): string {
  const trimmed = input.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return parseAuthorizationRedirect(trimmed);
  }
  if (!trimmed) {
    throw new InvalidArgumentError('Authorization code must not be empty');
  }
  return trimmed;
}

function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError(`Invalid timeout: ${value}`);
  }
  return seconds * 1000;
}

export function createAuthCommand(): Command {
  const authCommand = new Command('auth').description('Log in to Spotify');

  authCommand
    .command('login')
    .description('Open the consent page and wait for the redirect')
    .option('--no-open', 'print the URL instead of opening a browser')
    .option('--timeout <seconds>', 'how long to wait for the redirect', '120')
    .action(async (options: { open: boolean; timeout: string }, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const plugin = getPlugin();
        const timeoutMs = parseTimeout(options.timeout);
        const state = createState();
        const url = plugin.auth.buildAuthorizeUrl(state);
        const server = new LoginServer(plugin.config.getRedirectUri());

        const code = await server.waitForCode({ state, timeoutMs }, async () => {
          console.error(`Open this page to log in:\n${url}\n`);
          if (options.open) {
            await open(url);
          }
        });

        const token = await plugin.auth.exchangeCode(code);
        printSuccess(format, { authenticated: true, expiresAt: new Date(token.expiresAt).toISOString() }, () => {
          console.log('Logged in to Spotify');
        });
      });
    });

  authCommand
    .command('url')
    .description('Print the consent page URL')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, ({ format }) => {
        const url = getPlugin().auth.buildAuthorizeUrl();
        printSuccess(format, { url }, () => {
          console.log(url);
        });
      });
    });

  authCommand
    .command('code <code>')
    .description('Exchange an authorization code (or the redirect URL carrying it)')
    .action(async (input: string, _options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const token = await getPlugin().auth.exchangeCode(extractCode(input));
        printSuccess(format, { authenticated: true, expiresAt: new Date(token.expiresAt).toISOString() }, () => {
          console.log('Logged in to Spotify');
        });
      });
    });

  authCommand
    .command('status')
    .description('Show the login state and the account type')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const plugin = getPlugin();
        const authenticated = plugin.auth.isAuthenticated();
        const hasCredentials = plugin.config.hasCredentials();
        const redirectUri = plugin.config.getRedirectUri();
        let account: { id: string; displayName: string | null; product: string | null; premium: boolean } | null = null;

        if (authenticated) {
          const user = await plugin.api.getCurrentUser();
          account = {
            id: user.id,
            displayName: user.display_name,
            product: user.product ?? null,
            premium: user.product === 'premium',
          };
          if (!account.premium) {
            loggers.cli.warn('Playback control needs Spotify Premium', { product: user.product });
          }
        }
        const expiry = plugin.auth.getTokenExpiry();
        const tokenExpiresAt = expiry ? new Date(expiry).toISOString() : null;

        printSuccess(format, { hasCredentials, authenticated, redirectUri, tokenExpiresAt, account }, () => {
          const rows: Array<[string, string]> = [
            ['Credentials', hasCredentials ? 'set' : 'missing'],
            ['Logged in', authenticated ? 'yes' : 'no'],
            ['Redirect URI', redirectUri],
          ];
          if (tokenExpiresAt) {
            rows.push(['Token expires', tokenExpiresAt]);
          }
          if (account) {
            rows.push(['Account', account.displayName ?? account.id]);
            rows.push(['Product', account.premium ? 'premium' : `${account.product ?? 'unknown'} (Premium required for playback control)`]);
          }
          printKeyValueTable(rows);
        });
      });
    });

  authCommand
    .command('logout')
    .description('Forget the Spotify login')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, ({ format }) => {
        getPlugin().logout();
        printSuccess(format, { authenticated: false }, () => {
          console.log('Logged out');
        });
      });
    });

  return authCommand;
}

/**
 * Login Service
 * Receives the authorization redirect, either from a local callback server
 * (CLI) or from a URL the host's auth window intercepted.
 */

import { randomBytes } from 'node:crypto';
import { createServer, type Server } from 'node:http';
import { AuthError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export const LOGIN_TIMEOUT_MS = 120 * 1000;

export function createState(): string {
  return randomBytes(16).toString('hex');
}

/**
 * Extracts the authorization code from a redirect URL
 * @throws AuthError on a denied consent, a state mismatch or a missing code
 */
export function parseAuthorizationRedirect(redirectUrl: string, expectedState?: string): string {
  let url: URL;
  try {
    url = new URL(redirectUrl);
  } catch {
    throw new AuthError(`Not a valid redirect URL: ${redirectUrl}`);
  }

  const error = url.searchParams.get('error');
  if (error) {
    throw new AuthError(`Authorization denied: ${error}`, error);
  }

  if (expectedState !== undefined && url.searchParams.get('state') !== expectedState) {
    throw new AuthError('Authorization state mismatch');
  }

  const code = url.searchParams.get('code');
  if (!code) {
    throw new AuthError('Redirect did not carry an authorization code');
  }
  return code;
}

export interface WaitForCodeOptions {
  state: string;
  timeoutMs?: number;
}

/**
 * One-shot HTTP server on the redirect URI's host and port
 */
export class LoginServer {
  private redirectUri: URL;
  private server: Server | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(redirectUri: string) {
    this.redirectUri = new URL(redirectUri);
    if (this.redirectUri.protocol !== 'http:') {
      throw new AuthError(`Local login needs an http:// redirect URI, got ${redirectUri}`);
    }
  }

  /**
   * Starts listening; resolves with the code of the first redirect that reaches the callback path
   * @param onListening called once the port is open, e.g. to launch the browser
   */
  waitForCode(options: WaitForCodeOptions, onListening?: () => void | Promise<void>): Promise<string> {
    const { state, timeoutMs = LOGIN_TIMEOUT_MS } = options;
    const port = Number.parseInt(this.redirectUri.port, 10) || 80;
    const host = this.redirectUri.hostname;
    const callbackPath = this.redirectUri.pathname;

    return new Promise<string>((resolve, reject) => {
      const finish = (error: Error | null, code?: string) => {
        this.close();
        if (error) {
          reject(error);
        } else if (code) {
          resolve(code);
        }
      };

      this.server = createServer((req, res) => {
        const url = new URL(req.url ?? '/', this.redirectUri.origin);

        if (url.pathname !== callbackPath) {
          res.writeHead(404);
          res.end('Not found');
          return;
        }

        try {
          const code = parseAuthorizationRedirect(url.toString(), state);
          res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
          res.end(page('Logged in to Spotify', 'You can close this window.'));
          finish(null, code);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          res.writeHead(400, { 'Content-Type': 'text/html; charset=utf-8' });
          res.end(page('Spotify login failed', message));
          finish(error instanceof Error ? error : new AuthError(message));
        }
      });

      this.server.on('error', (err) => {
        finish(new AuthError(`Failed to start callback server: ${err.message}`));
      });

      this.server.listen(port, host, () => {
        loggers.auth.debug('Callback server listening', { url: this.redirectUri.toString() });
        Promise.resolve(onListening?.()).catch((err: unknown) => {
          finish(err instanceof Error ? err : new AuthError(String(err)));
        });
      });

      this.timer = setTimeout(() => {
        finish(new AuthError('Timed out waiting for the Spotify login'));
      }, timeoutMs);
    });
  }

  close(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

function page(title: string, message: string): string {
  const escape = (text: string) =>
    text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
  return `<!doctype html><html><head><title>${escape(title)}</title></head>` +
    `<body><h1>${escape(title)}</h1><p>${escape(message)}</p></body></html>`;
}

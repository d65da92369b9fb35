/**
 * Spotify plugin
 * The object a button host creates: wires settings, auth, the API client and
 * the playback monitor, registers the actions, and serves the auth panel.
 */

import { ConfigService } from './services/config.js';
import { SpotifyAuthService } from './services/auth.js';
import { SpotifyApiClient } from './services/api.js';
import { PlayerService } from './services/player.js';
import { PlaybackMonitor } from './services/playback-monitor.js';
import { createState, parseAuthorizationRedirect } from './services/login.js';
import { ACTIONS, findAction, type ActionServices } from './actions/index.js';
import { InvalidArgumentError } from './lib/errors.js';
import { loggers, setLogLevel } from './lib/logger.js';
import type { PluginSettings } from './types/config.js';
import type { ActionContext, ActionHolder, ButtonAction, PluginHost } from './types/host.js';

export class SpotifyPlugin {
  readonly config: ConfigService;
  readonly auth: SpotifyAuthService;
  readonly api: SpotifyApiClient;
  readonly player: PlayerService;
  readonly monitor: PlaybackMonitor;

  private host: PluginHost;
  private actions = new Map<string, ButtonAction>();
  private pendingState: string | null = null;

  constructor(host: PluginHost) {
    this.host = host;
    this.config = new ConfigService(host.settings);
    setLogLevel(this.config.getLogLevel());

    this.auth = new SpotifyAuthService(this.config);
    this.api = new SpotifyApiClient(this.auth);
    this.player = new PlayerService(this.api);
    this.monitor = new PlaybackMonitor(this.api, { interval: this.config.getPollInterval() });
  }

  /**
   * Hands every action to the host
   */
  register(): void {
    for (const holder of this.getActionHolders()) {
      this.host.registerAction(holder);
    }
    loggers.plugin.info('Actions registered', { count: ACTIONS.length });
  }

  getActionHolders(): ActionHolder[] {
    return ACTIONS.map((definition) => ({
      actionId: definition.actionId,
      name: definition.name,
      create: (context: ActionContext) => this.createAction(definition.actionId, context),
    }));
  }

  /**
   * Instantiates the action behind a placed button
   */
  createAction(actionId: string, context: ActionContext): ButtonAction {
    const definition = findAction(actionId);
    if (!definition) {
      throw new InvalidArgumentError(`Unknown action: ${actionId}`);
    }

    const action = definition.create(context, this.services(), this.host);
    const tracked: ButtonAction = {
      onReady: () => action.onReady(),
      onKeyDown: () => action.onKeyDown(),
      onKeyUp: () => action.onKeyUp(),
      dispose: () => {
        action.dispose();
        if (this.actions.get(context.id) === action) {
          this.actions.delete(context.id);
        }
      },
    };
    this.actions.get(context.id)?.dispose();
    this.actions.set(context.id, action);
    return tracked;
  }

  activeActionCount(): number {
    return this.actions.size;
  }

  /**
   * Consent page for the host's auth window. When the host has a window of
   * its own it is opened there; the URL is returned either way.
   */
  startLogin(): string {
    this.pendingState = createState();
    const url = this.auth.buildAuthorizeUrl(this.pendingState);
    this.host.openAuthWindow?.(url);
    return url;
  }

  /**
   * Redirect URL the auth window intercepted
   */
  async handleRedirect(redirectUrl: string): Promise<void> {
    const code = parseAuthorizationRedirect(redirectUrl, this.pendingState ?? undefined);
    this.pendingState = null;
    await this.handleAuthCode(code);
  }

  async handleAuthCode(code: string): Promise<void> {
    await this.auth.exchangeCode(code);
    this.host.notify({ kind: 'info', title: 'Spotify', message: 'Logged in to Spotify' });
    await this.monitor.poll();
  }

  logout(): void {
    this.auth.logout();
  }

  /**
   * Settings panel changes. New application credentials void the existing grant.
   */
  updateSettings(values: Partial<PluginSettings>): void {
    const credentialsChanged =
      (values.clientId !== undefined && values.clientId !== this.config.get('clientId')) ||
      (values.clientSecret !== undefined && values.clientSecret !== this.config.get('clientSecret'));

    this.config.update(values);

    if (credentialsChanged) {
      this.auth.logout();
    }
    if (values.pollInterval !== undefined) {
      this.monitor.setInterval(this.config.getPollInterval());
    }
    if (values.logLevel !== undefined) {
      setLogLevel(this.config.getLogLevel());
    }
  }

  dispose(): void {
    for (const action of [...this.actions.values()]) {
      action.dispose();
    }
    this.actions.clear();
    this.monitor.stop();
  }

  private services(): ActionServices {
    return { api: this.api, player: this.player, monitor: this.monitor };
  }
}

export { ACTIONS, findAction } from './actions/index.js';
export { MemorySettingsBackend, FileSettingsBackend } from './services/config.js';
export * from './lib/errors.js';
export type * from './types/host.js';
export type * from './types/api.js';
export type { PluginSettings, SettingsBackend } from './types/config.js';

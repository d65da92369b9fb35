/**
 * Action Base
 * Shared lifecycle of a button: initial media, key handling with error
 * notices, and optional playback-state updates.
 */

import type { SpotifyApiClient } from '../services/api.js';
import type { PlayerService } from '../services/player.js';
import type { PlaybackMonitor } from '../services/playback-monitor.js';
import type { PlaybackState } from '../types/api.js';
import type { ActionContext, ButtonAction, PluginHost } from '../types/host.js';
import { iconPath, type IconName } from '../lib/assets.js';
import { toNotice } from '../lib/errors.js';
import { createRequestId, loggers } from '../lib/logger.js';

/** Fraction of the key covered by icons */
export const ICON_SIZE = 0.75;

export interface ActionServices {
  api: SpotifyApiClient;
  player: PlayerService;
  monitor: PlaybackMonitor;
}

export abstract class ActionBase implements ButtonAction {
  protected readonly context: ActionContext;
  protected readonly services: ActionServices;
  protected readonly host: PluginHost;
  private unsubscribe: (() => void) | null = null;

  /** Actions whose media mirrors the playback state subscribe to the monitor */
  protected readonly followsPlayback: boolean = false;

  constructor(context: ActionContext, services: ActionServices, host: PluginHost) {
    this.context = context;
    this.services = services;
    this.host = host;
  }

  async onReady(): Promise<void> {
    await this.render(null);

    if (this.followsPlayback && !this.unsubscribe) {
      this.unsubscribe = this.services.monitor.subscribe((state) => this.onUpdate(state));
      await this.services.monitor.poll();
    }
  }

  async onKeyDown(): Promise<void> {
    await this.run('key down', () => this.press());
  }

  async onKeyUp(): Promise<void> {
    // key down does the work
  }

  /**
   * Called with every polled playback state
   */
  async onUpdate(state: PlaybackState | null): Promise<void> {
    await this.render(state);
  }

  dispose(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  protected abstract press(): Promise<void>;

  /**
   * Draws the media for a playback state (null: unknown or nothing playing)
   */
  protected abstract render(state: PlaybackState | null): Promise<void>;

  protected setIcon(name: IconName, size: number = ICON_SIZE): void {
    this.context.setMedia({ kind: 'icon', path: iconPath(name), size });
  }

  /**
   * Runs a key handler; failures are logged and shown by the host
   * @returns whether the handler succeeded
   */
  protected async run(label: string, fn: () => Promise<void>): Promise<boolean> {
    try {
      await loggers.action.trackAsync(`${this.context.actionId} ${label}`, fn, {
        requestId: createRequestId(),
        button: this.context.id,
      });
      return true;
    } catch (error) {
      this.host.notify(toNotice(error));
      return false;
    }
  }

  protected numberSetting(key: string, fallback: number): number {
    const value = this.context.settings[key];
    const parsed = typeof value === 'string' ? Number(value) : value;
    return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : fallback;
  }

  protected stringSetting(key: string): string | undefined {
    const value = this.context.settings[key];
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
  }

  protected booleanSetting(key: string, fallback: boolean): boolean {
    const value = this.context.settings[key];
    if (typeof value === 'boolean') {
      return value;
    }
    if (value === 'true' || value === 'false') {
      return value === 'true';
    }
    return fallback;
  }
}

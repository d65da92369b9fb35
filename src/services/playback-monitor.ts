/**
 * Playback Monitor
 * Polls the playback state while someone listens and hands every result to the
 * subscribers, so buttons follow changes made from other Spotify clients.
 */

import type { PlaybackState } from '../types/api.js';
import { NotAuthenticatedError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export type PlaybackListener = (state: PlaybackState | null) => void | Promise<void>;

export interface PlaybackSource {
  getPlaybackState(): Promise<PlaybackState | null>;
}

export interface PlaybackMonitorOptions {
  /** Polling interval (seconds), default 5 */
  interval?: number;
}

export class PlaybackMonitor {
  private source: PlaybackSource;
  private interval: number;
  private listeners = new Set<PlaybackListener>();
  private timeoutId: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private inFlight: Promise<PlaybackState | null> | null = null;
  private lastState: PlaybackState | null = null;
  private loggedOut = false;

  constructor(source: PlaybackSource, options: PlaybackMonitorOptions = {}) {
    this.source = source;
    this.interval = Math.max(1, options.interval ?? 5);
  }

  /**
   * Adds a listener; the first one starts polling
   * @returns function removing the listener again
   */
  subscribe(listener: PlaybackListener): () => void {
    this.listeners.add(listener);
    if (!this.running) {
      this.running = true;
      this.schedule(0);
    }
    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0) {
        this.stop();
      }
    };
  }

  /**
   * Polls now. Overlapping calls share one request.
   * Failures are logged and resolve to the last known state.
   */
  poll(): Promise<PlaybackState | null> {
    if (!this.inFlight) {
      this.inFlight = this.fetchAndNotify().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  setInterval(seconds: number): void {
    this.interval = Math.max(1, seconds);
  }

  getLastState(): PlaybackState | null {
    return this.lastState;
  }

  isRunning(): boolean {
    return this.running;
  }

  listenerCount(): number {
    return this.listeners.size;
  }

  stop(): void {
    this.running = false;
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }
  }

  private schedule(delayMs: number): void {
    this.timeoutId = setTimeout(() => {
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    this.timeoutId = null;
    await this.poll();
    // stop() + subscribe() during the poll already scheduled the next tick
    if (this.running && this.timeoutId === null) {
      this.schedule(this.interval * 1000);
    }
  }

  private async fetchAndNotify(): Promise<PlaybackState | null> {
    let state: PlaybackState | null;
    try {
      state = await this.source.getPlaybackState();
      this.loggedOut = false;
    } catch (error) {
      if (error instanceof NotAuthenticatedError) {
        // once per logged-out streak
        if (!this.loggedOut) {
          loggers.monitor.warn('Playback polling needs a Spotify login');
          this.loggedOut = true;
        }
      } else {
        loggers.monitor.error('Playback poll failed', error);
      }
      return this.lastState;
    }

    this.lastState = state;
    for (const listener of [...this.listeners]) {
      try {
        await listener(state);
      } catch (error) {
        loggers.monitor.error('Playback listener failed', error);
      }
    }
    return state;
  }
}

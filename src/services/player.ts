/**
 * Player Service
 * Toggles and steps built on top of the raw API calls: each reads the current
 * playback state, then issues the one request that moves it forward.
 */

import type { SpotifyApiClient } from './api.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { REPEAT_STATES, type Device, type PlaybackState, type RepeatState } from '../types/api.js';

/** Base volume when the active device does not report one */
export const FALLBACK_VOLUME = 10;

export function nextRepeatState(current: RepeatState | undefined): RepeatState {
  const index = current ? REPEAT_STATES.indexOf(current) : 0;
  return REPEAT_STATES[(Math.max(index, 0) + 1) % REPEAT_STATES.length];
}

export function isRepeatState(value: unknown): value is RepeatState {
  return REPEAT_STATES.some((state) => state === value);
}

export class PlayerService {
  private api: SpotifyApiClient;

  constructor(api: SpotifyApiClient) {
    this.api = api;
  }

  getState(): Promise<PlaybackState | null> {
    return this.api.getPlaybackState();
  }

  async isPlaying(): Promise<boolean> {
    const state = await this.api.getPlaybackState();
    return state?.is_playing ?? false;
  }

  /**
   * Pauses when playing, resumes otherwise
   * @returns whether playback is running afterwards
   */
  async togglePlayback(): Promise<boolean> {
    if (await this.isPlaying()) {
      await this.api.pause();
      return false;
    }
    await this.api.play();
    return true;
  }

  /**
   * @returns the new shuffle flag; an unknown state turns shuffle on
   */
  async toggleShuffle(): Promise<boolean> {
    const state = await this.api.getPlaybackState();
    const next = !(state?.shuffle_state ?? false);
    await this.api.setShuffle(next);
    return next;
  }

  /**
   * off → track → context → off
   */
  async cycleRepeat(): Promise<RepeatState> {
    const state = await this.api.getPlaybackState();
    const next = nextRepeatState(state?.repeat_state);
    await this.api.setRepeat(next);
    return next;
  }

  async getVolume(): Promise<number> {
    const state = await this.api.getPlaybackState();
    return state?.device.volume_percent ?? FALLBACK_VOLUME;
  }

  /**
   * Moves the volume by `delta` percentage points
   * @returns the volume that was set
   */
  async changeVolume(delta: number): Promise<number> {
    const current = await this.getVolume();
    return this.api.setVolume(current + delta);
  }

  /**
   * Finds a device by id, or by name (case-insensitive)
   */
  async findDevice(idOrName: string): Promise<Device | null> {
    const devices = await this.api.getDevices();
    const lowered = idOrName.toLowerCase();
    return (
      devices.find((device) => device.id === idOrName) ??
      devices.find((device) => device.name.toLowerCase() === lowered) ??
      null
    );
  }

  /**
   * Moves playback to a device; keeps it playing when it was playing
   */
  async selectDevice(idOrName: string): Promise<Device> {
    const device = await this.findDevice(idOrName);
    if (!device || !device.id) {
      throw new InvalidArgumentError(`No Spotify device named or with id "${idOrName}"`);
    }
    const playing = await this.isPlaying();
    await this.api.transferPlayback(device.id, playing);
    return device;
  }

  /**
   * Moves playback to the device after the active one
   * @returns the device selected, or null when there is none to switch to
   */
  async cycleDevice(): Promise<Device | null> {
    const devices = (await this.api.getDevices()).filter((device) => device.id && !device.is_restricted);
    if (devices.length === 0) {
      return null;
    }
    const activeIndex = devices.findIndex((device) => device.is_active);
    const next = devices[(activeIndex + 1) % devices.length];
    if (next.is_active || !next.id) {
      return null;
    }
    const playing = await this.isPlaying();
    await this.api.transferPlayback(next.id, playing);
    return next;
  }
}

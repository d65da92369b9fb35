/**
 * Play/Pause
 * Toggles playback. The key shows the cover of the current item with the
 * action the next press performs drawn on top (play while paused, pause while
 * playing); without cover art only the icon is drawn.
 */

import { ActionBase } from './base.js';
import { coverUrlOf } from '../lib/cover-art.js';
import { iconPath } from '../lib/assets.js';
import { loggers } from '../lib/logger.js';
import type { PlaybackState } from '../types/api.js';

/** Overlay box relative to the cover */
export const OVERLAY_SCALE = 0.7;

export class PlayPauseAction extends ActionBase {
  protected readonly followsPlayback = true;

  private coverUrl: string | null = null;
  private coverImage: Uint8Array | null = null;

  protected async press(): Promise<void> {
    const playing = await this.services.player.togglePlayback();
    const last = this.services.monitor.getLastState();
    await this.draw(playing, last);
  }

  protected async render(state: PlaybackState | null): Promise<void> {
    await this.draw(state?.is_playing ?? false, state);
  }

  private async draw(playing: boolean, state: PlaybackState | null): Promise<void> {
    const overlay = playing ? 'pause' : 'play';
    const showCover = this.booleanSetting('showCoverArt', true);
    const url = showCover ? coverUrlOf(state?.item) : null;
    const image = url ? await this.loadCover(url) : null;

    if (image) {
      this.context.setMedia({
        kind: 'cover',
        image,
        overlayPath: iconPath(overlay),
        overlayScale: OVERLAY_SCALE,
      });
      return;
    }

    this.setIcon(overlay);
  }

  /**
   * Bytes of the cover; the last one is kept while the item does not change
   */
  private async loadCover(url: string): Promise<Uint8Array | null> {
    if (url === this.coverUrl && this.coverImage) {
      return this.coverImage;
    }

    try {
      const image = await this.services.api.fetchImage(url);
      this.coverUrl = url;
      this.coverImage = image;
      return image;
    } catch (error) {
      loggers.action.warn('Cover art download failed', {
        url,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}

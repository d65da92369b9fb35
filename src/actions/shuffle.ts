/**
 * Shuffle toggle
 */

import { ActionBase } from './base.js';
import type { PlaybackState } from '../types/api.js';

export class ShuffleAction extends ActionBase {
  protected readonly followsPlayback = true;

  protected async press(): Promise<void> {
    const shuffle = await this.services.player.toggleShuffle();
    this.draw(shuffle);
  }

  protected async render(state: PlaybackState | null): Promise<void> {
    this.draw(state?.shuffle_state ?? false);
  }

  private draw(shuffle: boolean): void {
    this.setIcon(shuffle ? 'shuffle' : 'no_shuffle');
  }
}

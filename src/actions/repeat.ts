/**
 * Repeat mode: off → track → context → off
 */

import { ActionBase } from './base.js';
import type { IconName } from '../lib/assets.js';
import type { PlaybackState, RepeatState } from '../types/api.js';

const REPEAT_ICONS: Record<RepeatState, IconName> = {
  off: 'no_repeat',
  track: 'repeat_one',
  context: 'repeat',
};

export class RepeatAction extends ActionBase {
  protected readonly followsPlayback = true;

  protected async press(): Promise<void> {
    const next = await this.services.player.cycleRepeat();
    this.setIcon(REPEAT_ICONS[next]);
  }

  protected async render(state: PlaybackState | null): Promise<void> {
    this.setIcon(REPEAT_ICONS[state?.repeat_state ?? 'off']);
  }
}

/**
 * Volume step
 * Button setting `step`: percentage points per press (1-100, default 10).
 */

import { ActionBase, type ActionServices } from './base.js';
import type { ActionContext, PluginHost } from '../types/host.js';

export const DEFAULT_VOLUME_STEP = 10;

export type VolumeDirection = 1 | -1;

export class VolumeAction extends ActionBase {
  private direction: VolumeDirection;

  constructor(context: ActionContext, services: ActionServices, host: PluginHost, direction: VolumeDirection) {
    super(context, services, host);
    this.direction = direction;
  }

  get step(): number {
    const step = Math.round(this.numberSetting('step', DEFAULT_VOLUME_STEP));
    return Math.min(100, Math.max(1, step));
  }

  protected async press(): Promise<void> {
    await this.services.player.changeVolume(this.direction * this.step);
  }

  protected async render(): Promise<void> {
    this.setIcon(this.direction > 0 ? 'volume_up' : 'volume_down');
  }
}

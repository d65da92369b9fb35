/**
 * Playback device
 * Moves playback to the device named by the `deviceId` or `deviceName` button
 * setting; without one, each press moves to the next available device.
 */

import { ActionBase } from './base.js';

export class SelectDeviceAction extends ActionBase {
  protected async press(): Promise<void> {
    const target = this.stringSetting('deviceId') ?? this.stringSetting('deviceName');
    const device = target
      ? await this.services.player.selectDevice(target)
      : await this.services.player.cycleDevice();

    this.host.notify(
      device
        ? { kind: 'info', title: 'Playback device', message: `Playing on ${device.name}` }
        : { kind: 'info', title: 'Playback device', message: 'No other device available' }
    );
  }

  protected async render(): Promise<void> {
    this.setIcon('media_output');
  }
}

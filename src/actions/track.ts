/**
 * Next / Previous track
 */

import { ActionBase } from './base.js';

export class NextTrackAction extends ActionBase {
  protected async press(): Promise<void> {
    await this.services.api.next();
  }

  protected async render(): Promise<void> {
    this.setIcon('next');
  }
}

export class PreviousTrackAction extends ActionBase {
  protected async press(): Promise<void> {
    await this.services.api.previous();
  }

  protected async render(): Promise<void> {
    this.setIcon('previous');
  }
}

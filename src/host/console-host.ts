/**
 * Console Host
 * Runs the plugin's actions from the command line: settings come from the
 * config file, notices go to the log, and button media is recorded so the CLI
 * can print it.
 */

import type { SettingsBackend } from '../types/config.js';
import type {
  ActionContext,
  ActionHolder,
  ActionSettings,
  ButtonMedia,
  HostNotice,
  PluginHost,
} from '../types/host.js';
import { FileSettingsBackend } from '../services/config.js';
import { loggers } from '../lib/logger.js';

/**
 * Printable form of a button's media; image bytes are summarized
 */
export type MediaSummary =
  | { kind: 'icon'; path: string; size: number }
  | { kind: 'cover'; imageBytes: number; overlayPath: string; overlayScale: number };

export function summarizeMedia(media: ButtonMedia): MediaSummary {
  if (media.kind === 'icon') {
    return { kind: 'icon', path: media.path, size: media.size };
  }
  return {
    kind: 'cover',
    imageBytes: media.image.byteLength,
    overlayPath: media.overlayPath,
    overlayScale: media.overlayScale,
  };
}

export interface ConsoleHostOptions {
  settings?: SettingsBackend;
  /** Called whenever a button's media changes */
  onMedia?: (buttonId: string, media: ButtonMedia) => void;
}

export class ConsoleHost implements PluginHost {
  readonly settings: SettingsBackend;
  private holders = new Map<string, ActionHolder>();
  private media = new Map<string, ButtonMedia>();
  private notices: HostNotice[] = [];
  private onMedia?: (buttonId: string, media: ButtonMedia) => void;
  private nextButton = 1;

  constructor(options: ConsoleHostOptions = {}) {
    this.settings = options.settings ?? new FileSettingsBackend();
    this.onMedia = options.onMedia;
  }

  registerAction(holder: ActionHolder): void {
    this.holders.set(holder.actionId, holder);
  }

  getHolders(): ActionHolder[] {
    return [...this.holders.values()];
  }

  notify(notice: HostNotice): void {
    this.notices.push(notice);
    if (notice.kind === 'info') {
      loggers.cli.info(notice.message, { title: notice.title });
    } else {
      loggers.cli.warn(notice.message, { title: notice.title, kind: notice.kind, code: notice.code });
    }
  }

  getNotices(): HostNotice[] {
    return [...this.notices];
  }

  getMedia(buttonId: string): ButtonMedia | undefined {
    return this.media.get(buttonId);
  }

  /**
   * Places a button for a registered action
   */
  createContext(actionId: string, settings: ActionSettings = {}): ActionContext {
    const id = `button-${this.nextButton++}`;
    return {
      id,
      actionId,
      settings,
      setMedia: (media: ButtonMedia) => {
        this.media.set(id, media);
        this.onMedia?.(id, media);
      },
    };
  }
}

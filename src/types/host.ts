/**
 * Host plugin interface
 * What the button host (StreamController and the like) provides to the plugin,
 * and what the plugin hands back.
 */

import type { SettingsBackend } from './config.js';

/**
 * Plain icon drawn on a key
 */
export interface IconMedia {
  kind: 'icon';
  /** Absolute path of the image file */
  path: string;
  /** Fraction of the key the icon covers (0-1) */
  size: number;
}

/**
 * Album art with an icon centered on top of it
 */
export interface CoverMedia {
  kind: 'cover';
  /** Encoded image bytes (JPEG from the Spotify CDN) */
  image: Uint8Array;
  overlayPath: string;
  /** The overlay is scaled to fit this fraction of the background, keeping its aspect ratio */
  overlayScale: number;
}

export type ButtonMedia = IconMedia | CoverMedia;

/**
 * Per-button configuration as stored by the host
 */
export type ActionSettings = Record<string, string | number | boolean | undefined>;

/**
 * One placed button, owned by the host
 */
export interface ActionContext {
  /** Unique id of this button instance */
  readonly id: string;
  readonly actionId: string;
  readonly settings: ActionSettings;
  setMedia(media: ButtonMedia): void;
}

export type NoticeKind = 'error' | 'premium-required' | 'not-authenticated' | 'no-active-device' | 'info';

export interface HostNotice {
  kind: NoticeKind;
  title: string;
  message: string;
  /** Stable error code, when the notice comes from an error */
  code?: string;
}

/**
 * Action registration entry
 */
export interface ActionHolder {
  actionId: string;
  name: string;
  create(context: ActionContext): ButtonAction;
}

/**
 * Lifecycle callbacks the host drives
 */
export interface ButtonAction {
  onReady(): Promise<void>;
  onKeyDown(): Promise<void>;
  onKeyUp(): Promise<void>;
  dispose(): void;
}

export interface PluginHost {
  /** Settings storage of the plugin */
  readonly settings: SettingsBackend;
  registerAction(holder: ActionHolder): void;
  notify(notice: HostNotice): void;
  /** Opens the authorization page; the host reports the redirect back through the plugin */
  openAuthWindow?(url: string): void;
}

/**
 * Button icon files shipped in assets/
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';

// src/lib and dist/lib both sit two levels below the package root
export const ASSETS_DIR = fileURLToPath(new URL('../../assets/', import.meta.url));

export type IconName =
  | 'play'
  | 'pause'
  | 'next'
  | 'previous'
  | 'shuffle'
  | 'no_shuffle'
  | 'repeat'
  | 'repeat_one'
  | 'no_repeat'
  | 'volume_up'
  | 'volume_down'
  | 'media_output';

export function iconPath(name: IconName): string {
  return path.join(ASSETS_DIR, `${name}.svg`);
}

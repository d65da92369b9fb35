/**
 * Action registry
 */

import type { ActionContext, ButtonAction, PluginHost } from '../types/host.js';
import type { ActionServices } from './base.js';
import { PlayPauseAction } from './play-pause.js';
import { NextTrackAction, PreviousTrackAction } from './track.js';
import { ShuffleAction } from './shuffle.js';
import { RepeatAction } from './repeat.js';
import { VolumeAction } from './volume.js';
import { SelectDeviceAction } from './select-device.js';

export const ACTION_PREFIX = 'spotify-deck::';

export interface ActionDefinition {
  actionId: string;
  name: string;
  /** Button settings the action reads */
  settings: string[];
  create(context: ActionContext, services: ActionServices, host: PluginHost): ButtonAction;
}

export const ACTIONS: readonly ActionDefinition[] = [
  {
    actionId: `${ACTION_PREFIX}PlayPause`,
    name: 'Play/Pause',
    settings: ['showCoverArt'],
    create: (context, services, host) => new PlayPauseAction(context, services, host),
  },
  {
    actionId: `${ACTION_PREFIX}Next`,
    name: 'Next Track',
    settings: [],
    create: (context, services, host) => new NextTrackAction(context, services, host),
  },
  {
    actionId: `${ACTION_PREFIX}Previous`,
    name: 'Previous Track',
    settings: [],
    create: (context, services, host) => new PreviousTrackAction(context, services, host),
  },
  {
    actionId: `${ACTION_PREFIX}Shuffle`,
    name: 'Shuffle',
    settings: [],
    create: (context, services, host) => new ShuffleAction(context, services, host),
  },
  {
    actionId: `${ACTION_PREFIX}Repeat`,
    name: 'Repeat',
    settings: [],
    create: (context, services, host) => new RepeatAction(context, services, host),
  },
  {
    actionId: `${ACTION_PREFIX}VolumeUp`,
    name: 'Volume Up',
    settings: ['step'],
    create: (context, services, host) => new VolumeAction(context, services, host, 1),
  },
  {
    actionId: `${ACTION_PREFIX}VolumeDown`,
    name: 'Volume Down',
    settings: ['step'],
    create: (context, services, host) => new VolumeAction(context, services, host, -1),
  },
  {
    actionId: `${ACTION_PREFIX}SelectDevice`,
    name: 'Select Device',
    settings: ['deviceId', 'deviceName'],
    create: (context, services, host) => new SelectDeviceAction(context, services, host),
  },
];

/**
 * Looks an action up by full id or by its short name (`PlayPause`)
 */
export function findAction(id: string): ActionDefinition | undefined {
  const fullId = id.includes('::') ? id : `${ACTION_PREFIX}${id}`;
  return ACTIONS.find((action) => action.actionId.toLowerCase() === fullId.toLowerCase());
}

export { ActionBase, ICON_SIZE } from './base.js';
export type { ActionServices } from './base.js';

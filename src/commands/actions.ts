/**
 * Actions Command
 * Runs the button actions through the console host
 */

import { Command } from 'commander';
import { getSession } from '../lib/plugin-client.js';
import { printSuccess, printTable, runCommand, type OutputFormat } from '../lib/output.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { ACTIONS, findAction } from '../actions/index.js';
import { summarizeMedia } from '../host/console-host.js';
import { summarizePlayback } from './player.js';
import type { ActionSettings, HostNotice } from '../types/host.js';
import type { PlaybackState } from '../types/api.js';

/**
 * Collects repeated `--set key=value` options
 */
export function collectSetting(pair: string, previous: string[] = []): string[] {
  return [...previous, pair];
}

export function parseSettings(pairs: string[]): ActionSettings {
  const settings: ActionSettings = {};
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      throw new InvalidArgumentError(`Invalid setting "${pair}", expected key=value`);
    }
    settings[pair.slice(0, index).trim()] = pair.slice(index + 1);
  }
  return settings;
}

/**
 * One line per playback change
 */
export function playbackLine(state: PlaybackState | null): string {
  if (!state) {
    return 'Nothing is playing';
  }
  const item = state.item;
  const title = item
    ? item.type === 'track'
      ? `${item.name} - ${item.artists.map((artist) => artist.name).join(', ')}`
      : item.name
    : 'Unknown item';
  const volume = state.device.volume_percent === null ? '' : ` ${state.device.volume_percent}%`;
  return `${state.is_playing ? '▶' : '⏸'} ${title} [${state.device.name}${volume}] shuffle:${state.shuffle_state ? 'on' : 'off'} repeat:${state.repeat_state}`;
}

/**
 * Identity of a playback state, progress excluded
 */
export function changeKey(state: PlaybackState | null): string {
  if (!state) {
    return 'idle';
  }
  return [
    state.is_playing,
    state.item?.id ?? '',
    state.device.id ?? state.device.name,
    state.device.volume_percent ?? '',
    state.shuffle_state,
    state.repeat_state,
  ].join('|');
}

function printFailure(format: OutputFormat, notice: HostNotice): void {
  const error = { code: notice.code ?? 'ACTION_FAILED', message: notice.message };
  if (format === 'json') {
    console.log(JSON.stringify({ success: false, error, notice: notice.kind }, null, 2));
  } else {
    console.error(`${notice.title}: ${notice.message}`);
  }
  process.exitCode = notice.kind === 'not-authenticated' ? 3 : 2;
}

function waitForInterrupt(): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      process.off('SIGINT', done);
      process.off('SIGTERM', done);
      resolve();
    };
    process.once('SIGINT', done);
    process.once('SIGTERM', done);
  });
}

export function createActionsCommand(): Command {
  const actionsCommand = new Command('actions').description('Button actions');

  actionsCommand
    .command('list')
    .description('List the actions a host can place on a button')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, ({ format }) => {
        const actions = ACTIONS.map(({ actionId, name, settings }) => ({ actionId, name, settings }));
        printSuccess(format, { actions }, () => {
          printTable(
            ['Action', 'Name', 'Settings'],
            actions.map((action) => [action.actionId, action.name, action.settings.join(', ') || '-'])
          );
        });
      });
    });

  actionsCommand
    .command('press <actionId>')
    .description('Press a button once and print its media')
    .option('-s, --set <key=value>', 'button setting (repeatable)', collectSetting, [])
    .action(async (id: string, options: { set: string[] }, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const definition = findAction(id);
        if (!definition) {
          throw new InvalidArgumentError(`Unknown action: ${id}`);
        }

        const { plugin, host } = getSession();
        const context = host.createContext(definition.actionId, parseSettings(options.set));
        const action = plugin.createAction(definition.actionId, context);
        const before = host.getNotices().length;

        try {
          await action.onReady();
          await action.onKeyDown();
          await action.onKeyUp();
        } finally {
          action.dispose();
        }

        const notices = host.getNotices().slice(before);
        const failure = notices.find((notice) => notice.kind !== 'info');
        if (failure) {
          printFailure(format, failure);
          return;
        }

        const media = host.getMedia(context.id);
        const summary = media ? summarizeMedia(media) : null;
        printSuccess(format, { actionId: definition.actionId, media: summary, notices }, () => {
          console.log(`${definition.name} pressed`);
          for (const notice of notices) {
            console.log(notice.message);
          }
          if (summary) {
            console.log(summary.kind === 'icon' ? summary.path : `cover (${summary.imageBytes} bytes) + ${summary.overlayPath}`);
          }
        });
      });
    });

  actionsCommand
    .command('watch')
    .description('Print playback changes until interrupted')
    .option('-i, --interval <seconds>', 'polling interval')
    .action(async (options: { interval?: string }, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const { plugin } = getSession();
        if (options.interval !== undefined) {
          const seconds = Number(options.interval);
          if (!Number.isFinite(seconds) || seconds < 1) {
            throw new InvalidArgumentError(`Invalid interval: ${options.interval}`);
          }
          plugin.monitor.setInterval(seconds);
        }

        let last: string | null = null;
        const unsubscribe = plugin.monitor.subscribe((state) => {
          const line =
            format === 'json'
              ? JSON.stringify({ timestamp: new Date().toISOString(), ...summarizePlayback(state) })
              : playbackLine(state);
          const key = changeKey(state);
          if (key !== last) {
            last = key;
            console.log(line);
          }
        });

        await waitForInterrupt();
        unsubscribe();
      });
    });

  return actionsCommand;
}

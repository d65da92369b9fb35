/**
 * Player Command
 * Playback control from the command line
 */

import { Command } from 'commander';
import { getPlugin } from '../lib/plugin-client.js';
import { printKeyValueTable, printSuccess, runCommand } from '../lib/output.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { isRepeatState } from '../services/player.js';
import { coverUrlOf } from '../lib/cover-art.js';
import { REPEAT_STATES, type PlaybackState } from '../types/api.js';

export type VolumeChange = { kind: 'absolute'; percent: number } | { kind: 'relative'; delta: number };

/**
 * `50` sets the volume, `+10` and `-10` move it
 */
export function parseVolumeArgument(value: string): VolumeChange {
  const match = /^([+-])?(\d+)$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError(`Invalid volume "${value}", expected N, +N or -N`);
  }
  const amount = Number.parseInt(match[2], 10);
  if (match[1] === '+') {
    return { kind: 'relative', delta: amount };
  }
  if (match[1] === '-') {
    return { kind: 'relative', delta: -amount };
  }
  return { kind: 'absolute', percent: amount };
}

export function parseShuffleArgument(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'on':
    case 'true':
      return true;
    case 'off':
    case 'false':
      return false;
    default:
      throw new InvalidArgumentError(`Invalid shuffle state "${value}", expected on or off`);
  }
}

/**
 * Flat view of the playback state for output
 */
export function summarizePlayback(state: PlaybackState | null): Record<string, unknown> {
  if (!state) {
    return { active: false };
  }
  const item = state.item;
  return {
    active: true,
    playing: state.is_playing,
    shuffle: state.shuffle_state,
    repeat: state.repeat_state,
    progressMs: state.progress_ms,
    device: {
      id: state.device.id,
      name: state.device.name,
      type: state.device.type,
      volume: state.device.volume_percent,
    },
    item: item
      ? {
          type: item.type,
          name: item.name,
          artists: item.type === 'track' ? item.artists.map((artist) => artist.name) : [],
          album: item.type === 'track' ? item.album.name : item.show?.name ?? null,
          durationMs: item.duration_ms,
          coverUrl: coverUrlOf(item),
        }
      : null,
  };
}

function formatDuration(ms: number | null): string {
  if (ms === null) {
    return '-';
  }
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

function printPlaybackTable(state: PlaybackState | null): void {
  if (!state) {
    console.log('Nothing is playing');
    return;
  }
  const rows: Array<[string, string]> = [
    ['State', state.is_playing ? 'playing' : 'paused'],
    ['Device', `${state.device.name} (${state.device.type})`],
    ['Volume', state.device.volume_percent === null ? '-' : `${state.device.volume_percent}%`],
    ['Shuffle', state.shuffle_state ? 'on' : 'off'],
    ['Repeat', state.repeat_state],
  ];
  const item = state.item;
  if (item) {
    const by = item.type === 'track' ? item.artists.map((artist) => artist.name).join(', ') : item.show?.name;
    rows.push(['Now playing', by ? `${item.name} - ${by}` : item.name]);
    rows.push(['Position', `${formatDuration(state.progress_ms)} / ${formatDuration(item.duration_ms)}`]);
  }
  printKeyValueTable(rows);
}

export function createPlayerCommand(): Command {
  const playerCommand = new Command('player').description('Control playback');

  playerCommand
    .command('status')
    .description('Show what is playing')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const state = await getPlugin().player.getState();
        printSuccess(format, summarizePlayback(state), () => printPlaybackTable(state));
      });
    });

  playerCommand
    .command('play')
    .description('Resume playback')
    .option('-d, --device <id>', 'device to play on')
    .action(async (options: { device?: string }, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        await getPlugin().api.play(options.device);
        printSuccess(format, { playing: true }, () => console.log('Playing'));
      });
    });

  playerCommand
    .command('pause')
    .description('Pause playback')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        await getPlugin().api.pause();
        printSuccess(format, { playing: false }, () => console.log('Paused'));
      });
    });

  playerCommand
    .command('toggle')
    .description('Pause when playing, resume otherwise')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const playing = await getPlugin().player.togglePlayback();
        printSuccess(format, { playing }, () => console.log(playing ? 'Playing' : 'Paused'));
      });
    });

  playerCommand
    .command('next')
    .description('Skip to the next track')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        await getPlugin().api.next();
        printSuccess(format, { skipped: 'next' }, () => console.log('Skipped to next'));
      });
    });

  playerCommand
    .command('previous')
    .description('Go back to the previous track')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        await getPlugin().api.previous();
        printSuccess(format, { skipped: 'previous' }, () => console.log('Skipped to previous'));
      });
    });

  playerCommand
    .command('shuffle [state]')
    .description('Set shuffle on or off; toggles without an argument')
    .action(async (value: string | undefined, _options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const plugin = getPlugin();
        let shuffle: boolean;
        if (value === undefined) {
          shuffle = await plugin.player.toggleShuffle();
        } else {
          shuffle = parseShuffleArgument(value);
          await plugin.api.setShuffle(shuffle);
        }
        printSuccess(format, { shuffle }, () => console.log(`Shuffle ${shuffle ? 'on' : 'off'}`));
      });
    });

  playerCommand
    .command('repeat [mode]')
    .description(`Set the repeat mode (${REPEAT_STATES.join(', ')}); cycles without an argument`)
    .action(async (value: string | undefined, _options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const plugin = getPlugin();
        let repeat = value?.toLowerCase();
        if (repeat === undefined) {
          repeat = await plugin.player.cycleRepeat();
        } else if (isRepeatState(repeat)) {
          await plugin.api.setRepeat(repeat);
        } else {
          throw new InvalidArgumentError(`Invalid repeat mode "${value}", expected ${REPEAT_STATES.join(', ')}`);
        }
        const mode = repeat;
        printSuccess(format, { repeat: mode }, () => console.log(`Repeat ${mode}`));
      });
    });

  playerCommand
    .command('volume <value>')
    .description('Set the volume (N) or move it (+N, -N; write `-- -N` for a negative step)')
    .action(async (value: string, _options: unknown, cmd: Command) => {
      await runCommand(cmd, async ({ format }) => {
        const plugin = getPlugin();
        const change = parseVolumeArgument(value);
        const volume =
          change.kind === 'relative'
            ? await plugin.player.changeVolume(change.delta)
            : await plugin.api.setVolume(change.percent);
        printSuccess(format, { volume }, () => console.log(`Volume ${volume}%`));
      });
    });

  return playerCommand;
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('ofetch', () => {
  class FetchError extends Error {
    statusCode?: number;
    status?: number;
    data?: unknown;
    response?: { headers: Headers };

    constructor(message: string) {
      super(message);
      this.name = 'FetchError';
    }
  }

  return {
    ofetch: vi.fn(),
    FetchError,
  };
});
vi.mock('open', () => ({ default: vi.fn() }));

import { changeKey, collectSetting, parseSettings, playbackLine } from '../../src/commands/actions.js';
import { iconPath } from '../../src/lib/assets.js';
import { InvalidArgumentError } from '../../src/lib/errors.js';
import {
  apiRequests,
  device,
  fakeSpotify,
  fetchError,
  lastRequestTo,
  loggedInSettings,
  playbackState,
  type FakeSpotify,
} from '../helpers/spotify.js';
import { cleanupTempConfig, parseOutput, runCli, useTempConfig } from '../helpers/cli.js';

describe('actions command', () => {
  let temp: ReturnType<typeof useTempConfig>;
  let spotify: FakeSpotify;

  beforeEach(() => {
    vi.clearAllMocks();
    spotify = fakeSpotify();
    temp = useTempConfig(loggedInSettings());
  });

  afterEach(() => {
    cleanupTempConfig(temp.dir);
  });

  it('should list the actions', async () => {
    const result = await runCli(['actions', 'list']);

    const output = parseOutput(result);
    expect(output).toMatchObject({
      success: true,
      actions: expect.arrayContaining([
        { actionId: 'spotify-deck::PlayPause', name: 'Play/Pause', settings: ['showCoverArt'] },
        { actionId: 'spotify-deck::VolumeUp', name: 'Volume Up', settings: ['step'] },
      ]),
    });
  });

  describe('press', () => {
    it('should press a volume button with its step setting', async () => {
      const result = await runCli(['actions', 'press', 'VolumeUp', '--set', 'step=5']);

      expect(parseOutput(result)).toEqual({
        success: true,
        actionId: 'spotify-deck::VolumeUp',
        media: { kind: 'icon', path: iconPath('volume_up'), size: 0.75 },
        notices: [],
      });
      expect(lastRequestTo('/me/player/volume')?.query).toEqual({ volume_percent: 45 });
    });

    it('should draw the cover with the next action on top', async () => {
      const result = await runCli(['actions', 'press', 'PlayPause']);

      expect(parseOutput(result)).toEqual({
        success: true,
        actionId: 'spotify-deck::PlayPause',
        media: { kind: 'cover', imageBytes: 4, overlayPath: iconPath('play'), overlayScale: 0.7 },
        notices: [],
      });
      expect(apiRequests()).toEqual(['GET /me/player', 'GET /me/player', 'PUT /me/player/pause']);
    });

    it('should print info notices', async () => {
      spotify.devices = [device(), device({ id: 'device-2', name: 'Kitchen', is_active: false })];

      const result = await runCli(['-f', 'table', 'actions', 'press', 'SelectDevice', '-s', 'deviceName=Kitchen']);

      expect(result.exitCode).toBe(0);
      expect(result.stdout.split('\n')).toEqual(['Select Device pressed', 'Playing on Kitchen', iconPath('media_output')]);
    });

    it('should report Premium-required failures apart from other errors', async () => {
      spotify.failures.set(
        'POST /me/player/next',
        fetchError(403, { error: { status: 403, message: 'Player command failed: Premium required', reason: 'PREMIUM_REQUIRED' } })
      );

      const result = await runCli(['actions', 'press', 'Next']);

      expect(result.exitCode).toBe(2);
      expect(parseOutput(result)).toEqual({
        success: false,
        error: { code: 'PREMIUM_REQUIRED', message: 'Player command failed: Premium required' },
        notice: 'premium-required',
      });
    });

    it('should exit with 3 when not logged in', async () => {
      cleanupTempConfig(temp.dir);
      temp = useTempConfig({ clientId: 'test-client-id', clientSecret: 'test-secret' });

      const result = await runCli(['-f', 'table', 'actions', 'press', 'Shuffle']);

      expect(result.exitCode).toBe(3);
      expect(result.stderr).toContain('Spotify login required: Not logged in to Spotify, run the login flow first');
    });

    it('should reject unknown actions', async () => {
      const result = await runCli(['actions', 'press', 'Rewind']);

      expect(result.exitCode).toBe(1);
      expect(parseOutput(result)).toEqual({
        success: false,
        error: { code: 'INVALID_ARGUMENT', message: 'Unknown action: Rewind' },
      });
    });
  });
});

describe('action helpers', () => {
  it('should collect and parse settings', () => {
    const pairs = collectSetting('deviceName=Living Room', collectSetting('step=5'));

    expect(pairs).toEqual(['step=5', 'deviceName=Living Room']);
    expect(parseSettings(pairs)).toEqual({ step: '5', deviceName: 'Living Room' });
    expect(parseSettings(['url=a=b'])).toEqual({ url: 'a=b' });
  });

  it('should reject settings without a key', () => {
    expect(() => parseSettings(['step'])).toThrow(InvalidArgumentError);
    expect(() => parseSettings(['=5'])).toThrow('Invalid setting "=5", expected key=value');
  });

  it('should describe playback in one line', () => {
    expect(playbackLine(playbackState())).toBe('▶ Test Song - Test Artist [Desk Speaker 40%] shuffle:off repeat:off');
    expect(playbackLine(playbackState({ is_playing: false, item: null, shuffle_state: true }))).toBe(
      '⏸ Unknown item [Desk Speaker 40%] shuffle:on repeat:off'
    );
    expect(playbackLine(null)).toBe('Nothing is playing');
  });

  it('should ignore progress when comparing states', () => {
    expect(changeKey(playbackState())).toBe('true|track-1|device-1|40|false|off');
    expect(changeKey(playbackState({ progress_ms: 90_000 }))).toBe(changeKey(playbackState()));
    expect(changeKey(playbackState({ is_playing: false }))).not.toBe(changeKey(playbackState()));
    expect(changeKey(null)).toBe('idle');
  });
});

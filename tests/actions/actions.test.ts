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

import { ofetch } from 'ofetch';
import { SpotifyPlugin } from '../../src/plugin.js';
import { MemorySettingsBackend } from '../../src/services/config.js';
import { ConsoleHost, summarizeMedia } from '../../src/host/console-host.js';
import { iconPath } from '../../src/lib/assets.js';
import { ICON_SIZE } from '../../src/actions/index.js';
import { OVERLAY_SCALE } from '../../src/actions/play-pause.js';
import type { ActionSettings, ButtonAction } from '../../src/types/host.js';
import type { PluginSettings } from '../../src/types/config.js';
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

const PREMIUM_BODY = {
  error: { status: 403, message: 'Player command failed: Premium required', reason: 'PREMIUM_REQUIRED' },
};

describe('actions', () => {
  let host: ConsoleHost;
  let plugin: SpotifyPlugin;
  let spotify: FakeSpotify;

  function setup(settings: PluginSettings = loggedInSettings()) {
    host = new ConsoleHost({ settings: new MemorySettingsBackend(settings) });
    plugin = new SpotifyPlugin(host);
    plugin.register();
  }

  function place(actionId: string, settings: ActionSettings = {}): { button: ButtonAction; id: string } {
    const context = host.createContext(actionId, settings);
    return { button: plugin.createAction(actionId, context), id: context.id };
  }

  async function press(button: ButtonAction): Promise<void> {
    await button.onKeyDown();
    await button.onKeyUp();
  }

  function media(id: string) {
    const current = host.getMedia(id);
    return current ? summarizeMedia(current) : undefined;
  }

  function icon(name: Parameters<typeof iconPath>[0]) {
    return { kind: 'icon', path: iconPath(name), size: ICON_SIZE };
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.clearAllMocks();
    vi.stubEnv('SPOTIFY_CLIENT_ID', '');
    vi.stubEnv('SPOTIFY_CLIENT_SECRET', '');
    vi.stubEnv('SPOTIFY_DECK_LOG_LEVEL', '');
    vi.spyOn(console, 'error').mockImplementation(() => {});
    spotify = fakeSpotify();
    setup();
  });

  afterEach(() => {
    plugin.dispose();
    vi.useRealTimers();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('Play/Pause', () => {
    it('should draw the cover with the pause overlay while playing', async () => {
      const { button, id } = place('PlayPause');

      await button.onReady();

      expect(apiRequests()).toEqual(['GET /me/player']);
      expect(ofetch).toHaveBeenCalledWith('https://images.test/300.jpg', { responseType: 'arrayBuffer' });
      expect(media(id)).toEqual({
        kind: 'cover',
        imageBytes: 4,
        overlayPath: iconPath('pause'),
        overlayScale: OVERLAY_SCALE,
      });
    });

    it('should pause and switch the overlay to play', async () => {
      const { button, id } = place('PlayPause');
      await button.onReady();

      await press(button);

      expect(apiRequests()).toEqual(['GET /me/player', 'GET /me/player', 'PUT /me/player/pause']);
      expect(media(id)).toMatchObject({ kind: 'cover', overlayPath: iconPath('play') });
      // same item, cover downloaded once
      expect(vi.mocked(ofetch).mock.calls.filter(([request]) => request === 'https://images.test/300.jpg')).toHaveLength(1);
    });

    it('should resume while paused', async () => {
      spotify.playback = playbackState({ is_playing: false });
      const { button } = place('PlayPause');

      await press(button);

      expect(apiRequests()).toEqual(['GET /me/player', 'PUT /me/player/play']);
    });

    it('should draw only the icon when cover art is off', async () => {
      const { button, id } = place('PlayPause', { showCoverArt: 'false' });

      await button.onReady();

      expect(media(id)).toEqual(icon('pause'));
      expect(ofetch).not.toHaveBeenCalledWith('https://images.test/300.jpg', { responseType: 'arrayBuffer' });
    });

    it('should fall back to the icon when the cover download fails', async () => {
      spotify.failures.set('IMAGE https://images.test/300.jpg', fetchError(500));
      const { button, id } = place('PlayPause');

      await button.onReady();

      expect(media(id)).toEqual(icon('pause'));
      expect(host.getNotices()).toEqual([]);
    });

    it('should show the play icon when nothing is playing', async () => {
      spotify.playback = null;
      const { button, id } = place('PlayPause');

      await button.onReady();

      expect(media(id)).toEqual(icon('play'));
    });

    it('should follow playback changes from other clients', async () => {
      const { button, id } = place('PlayPause', { showCoverArt: false });
      await button.onReady();

      spotify.playback = playbackState({ is_playing: false });
      await plugin.monitor.poll();

      expect(media(id)).toEqual(icon('play'));
    });
  });

  describe('track skipping', () => {
    it('should skip to the next track', async () => {
      const { button, id } = place('Next');
      await button.onReady();

      await press(button);

      expect(media(id)).toEqual(icon('next'));
      expect(apiRequests()).toEqual(['POST /me/player/next']);
    });

    it('should go back to the previous track', async () => {
      const { button, id } = place('Previous');
      await button.onReady();

      await press(button);

      expect(media(id)).toEqual(icon('previous'));
      expect(apiRequests()).toEqual(['POST /me/player/previous']);
    });
  });

  describe('Shuffle', () => {
    it('should show the current shuffle state', async () => {
      spotify.playback = playbackState({ shuffle_state: true });
      const { button, id } = place('Shuffle');

      await button.onReady();

      expect(media(id)).toEqual(icon('shuffle'));
    });

    it('should toggle shuffle', async () => {
      const { button, id } = place('Shuffle');
      await button.onReady();
      expect(media(id)).toEqual(icon('no_shuffle'));

      await press(button);

      expect(lastRequestTo('/me/player/shuffle')).toEqual({ query: { state: true }, body: undefined });
      expect(media(id)).toEqual(icon('shuffle'));
    });
  });

  describe('Repeat', () => {
    it.each([
      ['off', 'track', 'repeat_one'],
      ['track', 'context', 'repeat'],
      ['context', 'off', 'no_repeat'],
    ] as const)('should go from %s to %s', async (current, next, iconName) => {
      spotify.playback = playbackState({ repeat_state: current });
      const { button, id } = place('Repeat');

      await press(button);

      expect(lastRequestTo('/me/player/repeat')).toEqual({ query: { state: next }, body: undefined });
      expect(media(id)).toEqual(icon(iconName));
    });
  });

  describe('Volume', () => {
    it.each([
      ['VolumeUp', {}, 50],
      ['VolumeDown', {}, 30],
      ['VolumeUp', { step: '5' }, 45],
      ['VolumeDown', { step: 25 }, 15],
      ['VolumeUp', { step: 'loud' }, 50],
      ['VolumeDown', { step: 500 }, 0],
      ['VolumeUp', { step: 0 }, 41],
    ])('%s with %o should set %i', async (actionId, settings, volume) => {
      const { button } = place(actionId, settings);

      await press(button);

      expect(apiRequests()).toEqual(['GET /me/player', 'PUT /me/player/volume']);
      expect(lastRequestTo('/me/player/volume')).toEqual({ query: { volume_percent: volume }, body: undefined });
    });

    it('should draw the direction icon', async () => {
      const up = place('VolumeUp');
      const down = place('VolumeDown');

      await up.button.onReady();
      await down.button.onReady();

      expect(media(up.id)).toEqual(icon('volume_up'));
      expect(media(down.id)).toEqual(icon('volume_down'));
    });
  });

  describe('Select Device', () => {
    const kitchen = device({ id: 'device-2', name: 'Kitchen', is_active: false });

    beforeEach(() => {
      spotify.devices = [device(), kitchen];
    });

    it('should move playback to the configured device', async () => {
      const { button, id } = place('SelectDevice', { deviceName: 'kitchen' });
      await button.onReady();

      await press(button);

      expect(media(id)).toEqual(icon('media_output'));
      expect(lastRequestTo('/me/player')).toEqual({ query: undefined, body: { device_ids: ['device-2'], play: true } });
      expect(host.getNotices()).toEqual([{ kind: 'info', title: 'Playback device', message: 'Playing on Kitchen' }]);
    });

    it('should cycle devices without a configured one', async () => {
      const { button } = place('SelectDevice');

      await press(button);

      expect(apiRequests()).toEqual(['GET /me/player/devices', 'GET /me/player', 'PUT /me/player']);
      expect(host.getNotices()[0].message).toBe('Playing on Kitchen');
    });

    it('should say so when there is no other device', async () => {
      spotify.devices = [device()];
      const { button } = place('SelectDevice');

      await press(button);

      expect(host.getNotices()).toEqual([
        { kind: 'info', title: 'Playback device', message: 'No other device available' },
      ]);
    });

    it('should report an unknown device as an error', async () => {
      const { button } = place('SelectDevice', { deviceId: 'device-9' });

      await press(button);

      expect(host.getNotices()).toEqual([
        {
          kind: 'error',
          title: 'Spotify request failed',
          message: 'No Spotify device named or with id "device-9"',
          code: 'INVALID_ARGUMENT',
        },
      ]);
    });
  });

  describe('failures', () => {
    it('should surface Premium-required answers as their own notice', async () => {
      spotify.failures.set('PUT /me/player/pause', fetchError(403, PREMIUM_BODY));
      const { button } = place('PlayPause');

      await press(button);

      expect(host.getNotices()).toEqual([
        {
          kind: 'premium-required',
          title: 'Spotify Premium required',
          message: 'Player command failed: Premium required',
          code: 'PREMIUM_REQUIRED',
        },
      ]);
    });

    it('should ask for a device when none is active', async () => {
      spotify.failures.set(
        'POST /me/player/next',
        fetchError(404, { error: { status: 404, message: 'Player command failed: No active device found', reason: 'NO_ACTIVE_DEVICE' } })
      );
      const { button } = place('Next');

      await press(button);

      expect(host.getNotices()[0]).toMatchObject({ kind: 'no-active-device', code: 'NO_ACTIVE_DEVICE' });
    });

    it('should ask for a login without a grant', async () => {
      plugin.dispose();
      setup({ clientId: 'test-client-id', clientSecret: 'test-secret' });
      const { button } = place('Next');

      await press(button);

      expect(ofetch).not.toHaveBeenCalled();
      expect(host.getNotices()).toEqual([
        {
          kind: 'not-authenticated',
          title: 'Spotify login required',
          message: 'Not logged in to Spotify, run the login flow first',
          code: 'NOT_AUTHENTICATED',
        },
      ]);
    });

    it('should refresh an expired token before the press', async () => {
      plugin.dispose();
      setup({ ...loggedInSettings(), expiresAt: Date.now() - 1000 });
      const { button } = place('Next');

      await press(button);

      expect(apiRequests()).toEqual(['POST /me/player/next']);
      expect(vi.mocked(ofetch).mock.calls[1][1]).toMatchObject({ headers: { Authorization: 'Bearer fresh-token' } });
      expect(host.getNotices()).toEqual([]);
    });
  });

  it('should stop following playback once disposed', async () => {
    const { button } = place('Shuffle');
    await button.onReady();
    expect(plugin.monitor.listenerCount()).toBe(1);
    expect(plugin.activeActionCount()).toBe(1);

    button.dispose();

    expect(plugin.monitor.listenerCount()).toBe(0);
    expect(plugin.monitor.isRunning()).toBe(false);
    expect(plugin.activeActionCount()).toBe(0);
  });
});

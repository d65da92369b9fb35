import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SpotifyApiClient } from '../../src/services/api.js';
import { PlayerService, FALLBACK_VOLUME, nextRepeatState, isRepeatState } from '../../src/services/player.js';
import { InvalidArgumentError } from '../../src/lib/errors.js';
import { device, playbackState } from '../helpers/spotify.js';

function stubApi() {
  const api = new SpotifyApiClient({ getToken: async () => 'test-token', invalidate: () => {} });
  return {
    api,
    getPlaybackState: vi.spyOn(api, 'getPlaybackState').mockResolvedValue(playbackState()),
    getDevices: vi.spyOn(api, 'getDevices').mockResolvedValue([device()]),
    play: vi.spyOn(api, 'play').mockResolvedValue(undefined),
    pause: vi.spyOn(api, 'pause').mockResolvedValue(undefined),
    setShuffle: vi.spyOn(api, 'setShuffle').mockResolvedValue(undefined),
    setRepeat: vi.spyOn(api, 'setRepeat').mockResolvedValue(undefined),
    setVolume: vi.spyOn(api, 'setVolume').mockImplementation(async (volume) => volume),
    transferPlayback: vi.spyOn(api, 'transferPlayback').mockResolvedValue(undefined),
  };
}

describe('PlayerService', () => {
  let stub: ReturnType<typeof stubApi>;
  let player: PlayerService;

  beforeEach(() => {
    stub = stubApi();
    player = new PlayerService(stub.api);
  });

  describe('togglePlayback', () => {
    it('should pause while playing', async () => {
      await expect(player.togglePlayback()).resolves.toBe(false);

      expect(stub.pause).toHaveBeenCalledOnce();
      expect(stub.play).not.toHaveBeenCalled();
    });

    it('should resume while paused', async () => {
      stub.getPlaybackState.mockResolvedValue(playbackState({ is_playing: false }));

      await expect(player.togglePlayback()).resolves.toBe(true);

      expect(stub.play).toHaveBeenCalledOnce();
      expect(stub.pause).not.toHaveBeenCalled();
    });

    it('should start playback when nothing is active', async () => {
      stub.getPlaybackState.mockResolvedValue(null);

      await expect(player.togglePlayback()).resolves.toBe(true);
      expect(stub.play).toHaveBeenCalledWith();
    });
  });

  describe('toggleShuffle', () => {
    it('should flip the shuffle flag', async () => {
      await expect(player.toggleShuffle()).resolves.toBe(true);
      expect(stub.setShuffle).toHaveBeenCalledWith(true);

      stub.getPlaybackState.mockResolvedValue(playbackState({ shuffle_state: true }));
      await expect(player.toggleShuffle()).resolves.toBe(false);
      expect(stub.setShuffle).toHaveBeenLastCalledWith(false);
    });

    it('should turn shuffle on without playback state', async () => {
      stub.getPlaybackState.mockResolvedValue(null);

      await expect(player.toggleShuffle()).resolves.toBe(true);
    });
  });

  describe('cycleRepeat', () => {
    it.each([
      ['off', 'track'],
      ['track', 'context'],
      ['context', 'off'],
    ] as const)('should go from %s to %s', async (current, next) => {
      stub.getPlaybackState.mockResolvedValue(playbackState({ repeat_state: current }));

      await expect(player.cycleRepeat()).resolves.toBe(next);
      expect(stub.setRepeat).toHaveBeenCalledWith(next);
    });

    it('should start the cycle without playback state', async () => {
      stub.getPlaybackState.mockResolvedValue(null);

      await expect(player.cycleRepeat()).resolves.toBe('track');
    });
  });

  describe('volume', () => {
    it('should step from the device volume', async () => {
      await expect(player.changeVolume(10)).resolves.toBe(50);
      await expect(player.changeVolume(-15)).resolves.toBe(25);

      expect(stub.setVolume.mock.calls).toEqual([[50], [25]]);
    });

    it('should step from the fallback volume when the device reports none', async () => {
      stub.getPlaybackState.mockResolvedValue(playbackState({ device: device({ volume_percent: null }) }));

      await expect(player.getVolume()).resolves.toBe(FALLBACK_VOLUME);
      await player.changeVolume(5);
      expect(stub.setVolume).toHaveBeenCalledWith(FALLBACK_VOLUME + 5);
    });

    it('should use the fallback volume without playback state', async () => {
      stub.getPlaybackState.mockResolvedValue(null);

      await expect(player.getVolume()).resolves.toBe(10);
    });
  });

  describe('devices', () => {
    const kitchen = device({ id: 'device-2', name: 'Kitchen', is_active: false, volume_percent: 70 });

    beforeEach(() => {
      stub.getDevices.mockResolvedValue([device(), kitchen]);
    });

    it('should find a device by id or by name', async () => {
      await expect(player.findDevice('device-2')).resolves.toEqual(kitchen);
      await expect(player.findDevice('kitchen')).resolves.toEqual(kitchen);
      await expect(player.findDevice('Garage')).resolves.toBeNull();
    });

    it('should transfer playback and keep it running', async () => {
      const selected = await player.selectDevice('Kitchen');

      expect(selected.id).toBe('device-2');
      expect(stub.transferPlayback).toHaveBeenCalledWith('device-2', true);
    });

    it('should keep playback paused when transferring a paused session', async () => {
      stub.getPlaybackState.mockResolvedValue(playbackState({ is_playing: false }));

      await player.selectDevice('device-2');

      expect(stub.transferPlayback).toHaveBeenCalledWith('device-2', false);
    });

    it('should reject unknown devices', async () => {
      await expect(player.selectDevice('Garage')).rejects.toThrow(InvalidArgumentError);
      expect(stub.transferPlayback).not.toHaveBeenCalled();
    });

    it('should cycle to the device after the active one', async () => {
      await expect(player.cycleDevice()).resolves.toEqual(kitchen);
      expect(stub.transferPlayback).toHaveBeenCalledWith('device-2', true);
    });

    it('should wrap around and skip restricted devices', async () => {
      stub.getDevices.mockResolvedValue([
        device({ id: 'device-0', name: 'Phone', is_active: false }),
        device({ id: 'device-locked', name: 'Locked', is_active: false, is_restricted: true }),
        device({ id: 'device-1', name: 'Desk Speaker', is_active: true }),
      ]);

      const next = await player.cycleDevice();

      expect(next?.id).toBe('device-0');
    });

    it('should pick the first device when none is active', async () => {
      stub.getDevices.mockResolvedValue([kitchen]);

      await expect(player.cycleDevice()).resolves.toEqual(kitchen);
    });

    it('should return null when there is nothing to switch to', async () => {
      stub.getDevices.mockResolvedValue([device()]);
      await expect(player.cycleDevice()).resolves.toBeNull();

      stub.getDevices.mockResolvedValue([]);
      await expect(player.cycleDevice()).resolves.toBeNull();

      expect(stub.transferPlayback).not.toHaveBeenCalled();
    });
  });
});

describe('repeat helpers', () => {
  it('should advance the repeat mode', () => {
    expect(nextRepeatState(undefined)).toBe('track');
    expect(nextRepeatState('context')).toBe('off');
  });

  it('should recognize repeat modes', () => {
    expect(isRepeatState('track')).toBe(true);
    expect(isRepeatState('all')).toBe(false);
  });
});

/**
 * Spotify Web API types
 * Only the fields the plugin reads are declared.
 */

export type RepeatState = 'off' | 'track' | 'context';

export const REPEAT_STATES: readonly RepeatState[] = ['off', 'track', 'context'];

export interface SpotifyImage {
  url: string;
  height: number | null;
  width: number | null;
}

export interface Device {
  id: string | null;
  name: string;
  /** Computer, Smartphone, Speaker, ... */
  type: string;
  is_active: boolean;
  is_private_session?: boolean;
  is_restricted: boolean;
  volume_percent: number | null;
  supports_volume?: boolean;
}

export interface DevicesResponse {
  devices: Device[];
}

export interface Artist {
  id: string;
  name: string;
}

export interface Album {
  id: string;
  name: string;
  images: SpotifyImage[];
}

export interface Track {
  type: 'track';
  id: string;
  name: string;
  duration_ms: number;
  artists: Artist[];
  album: Album;
}

export interface Episode {
  type: 'episode';
  id: string;
  name: string;
  duration_ms: number;
  images: SpotifyImage[];
  show?: { name: string; images: SpotifyImage[] };
}

export type PlayableItem = Track | Episode;

/**
 * GET /me/player
 */
export interface PlaybackState {
  device: Device;
  repeat_state: RepeatState;
  shuffle_state: boolean;
  is_playing: boolean;
  progress_ms: number | null;
  timestamp: number;
  currently_playing_type?: 'track' | 'episode' | 'ad' | 'unknown';
  item: PlayableItem | null;
}

export interface UserProfile {
  id: string;
  display_name: string | null;
  /** premium, free, open */
  product?: string;
  country?: string;
}

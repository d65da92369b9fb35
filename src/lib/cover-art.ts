/**
 * Cover art helpers
 */

import type { PlayableItem, SpotifyImage } from '../types/api.js';

/** Smallest edge worth drawing on a key */
export const MIN_COVER_SIZE = 72;

/**
 * Album art of a track, show art of an episode
 */
export function itemImages(item: PlayableItem | null | undefined): SpotifyImage[] {
  if (!item) {
    return [];
  }
  if (item.type === 'track') {
    return item.album.images;
  }
  return item.images.length > 0 ? item.images : (item.show?.images ?? []);
}

/**
 * Picks the smallest image at least `minSize` wide, or the largest one when
 * none is that big. Images without a width count as large enough.
 */
export function pickCoverImage(
  images: SpotifyImage[],
  minSize: number = MIN_COVER_SIZE
): SpotifyImage | null {
  if (images.length === 0) {
    return null;
  }

  const width = (image: SpotifyImage) => image.width ?? Number.MAX_SAFE_INTEGER;
  const bySize = [...images].sort((a, b) => width(a) - width(b));

  return bySize.find((image) => width(image) >= minSize) ?? bySize[bySize.length - 1];
}

export function coverUrlOf(item: PlayableItem | null | undefined): string | null {
  return pickCoverImage(itemImages(item))?.url ?? null;
}

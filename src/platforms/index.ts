import { facebookAdapter } from './facebook.js';
import { instagramAdapter } from './instagram.js';
import { tiktokAdapter } from './tiktok.js';
import { PLATFORMS, type Platform, type PublishAdapter } from './types.js';
import { youtubeAdapter } from './youtube.js';

export type { Platform, PublishAdapter, PublishAttempt, PublishRequest } from './types.js';

const ADAPTERS: Record<Platform, PublishAdapter> = {
  tiktok:    tiktokAdapter,
  instagram: instagramAdapter,
  youtube:   youtubeAdapter,
  facebook:  facebookAdapter,
};

function isPlatform(value: string): value is Platform {
  return PLATFORMS.some(p => p === value);
}

/** Adapter for a social account's platform, or null when unsupported. */
export function getAdapter(platform: string): PublishAdapter | null {
  const key = platform.toLowerCase();
  return isPlatform(key) ? ADAPTERS[key] : null;
}

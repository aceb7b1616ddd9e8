/**
 * TikTok Content Posting API v2 — pull-by-URL.
 *
 * TikTok fetches the video itself from `video_url`; the URL's domain must be
 * verified in the TikTok developer portal.
 */
import { z } from 'zod';
import { PLATFORM_LIMITS } from '../config.js';
import { ProviderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { requestJson } from './http.js';
import type { PublishAdapter, PublishRequest } from './types.js';

export const TIKTOK_INIT_URL = 'https://open.tiktokapis.com/v2/post/publish/inbox/video/init/';

const InitResponseSchema = z.object({
  data:  z.object({ publish_id: z.string().optional() }).passthrough().nullish(),
  error: z.object({ code: z.string().optional(), message: z.string().optional() }).passthrough().nullish(),
}).passthrough();

async function initiate({ videoUrl, caption, accessToken }: PublishRequest) {
  const title = caption.slice(0, PLATFORM_LIMITS.tiktok.titleMax) || 'Video';
  logger.info('TikTok: initializing pull-by-URL upload');

  const res = await requestJson('tiktok', TIKTOK_INIT_URL, {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${accessToken}`,
      'Content-Type':  'application/json',
    },
    body: JSON.stringify({
      post_info: {
        title,
        privacy_level:   'PUBLIC_TO_EVERYONE',
        disable_duet:    false,
        disable_comment: false,
      },
      source_info: {
        source:    'PULL_FROM_URL',
        video_url: videoUrl,
      },
    }),
  }, InitResponseSchema);

  const code = res.error?.code;
  if (code && code !== 'ok') {
    throw new ProviderError('tiktok', res.error?.message || `TikTok init failed: ${code}`);
  }
  const publishId = res.data?.publish_id;
  if (!publishId) throw new ProviderError('tiktok', 'No publish_id from TikTok');

  logger.info('TikTok: upload initialized', { publishId });
  return { platformPostId: publishId };
}

export const tiktokAdapter: PublishAdapter = { platform: 'tiktok', initiate };

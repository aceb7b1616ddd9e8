/**
 * Facebook Graph API — direct upload by `file_url`.
 */
import { z } from 'zod';
import { GRAPH_API_VERSION, PLATFORM_LIMITS } from '../config.js';
import { logger } from '../utils/logger.js';
import { requestJson, withQuery } from './http.js';
import type { PublishAdapter, PublishRequest } from './types.js';

const VideoSchema = z.object({ id: z.string().optional() }).passthrough();

async function initiate({ videoUrl, caption, accessToken }: PublishRequest) {
  const url = withQuery(`https://graph.facebook.com/${GRAPH_API_VERSION}/me/videos`, { access_token: accessToken });
  const res = await requestJson('facebook', url, {
    method: 'POST',
    body: new URLSearchParams({
      file_url:    videoUrl,
      description: caption.slice(0, PLATFORM_LIMITS.facebook.descriptionMax),
    }),
  }, VideoSchema);

  const videoId = res.id || 'unknown';
  logger.info('Facebook: video submitted', { videoId });
  return { platformPostId: videoId };
}

export const facebookAdapter: PublishAdapter = { platform: 'facebook', initiate };

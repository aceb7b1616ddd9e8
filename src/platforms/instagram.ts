/**
 * Instagram Graph API — container-then-publish.
 *
 *   1. POST /me/media           (media_type VIDEO, video_url, caption) → container id
 *   2. GET  /{container}?fields=status_code  until FINISHED (ERROR aborts)
 *   3. POST /me/media_publish?creation_id={container} → media id
 */
import { z } from 'zod';
import { GRAPH_API_VERSION, INSTAGRAM_POLL, PLATFORM_LIMITS } from '../config.js';
import { ProviderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { requestJson, withQuery } from './http.js';
import type { PublishAdapter, PublishRequest } from './types.js';

const GRAPH_BASE = `https://graph.facebook.com/${GRAPH_API_VERSION}`;

const IdSchema = z.object({ id: z.string().optional() }).passthrough();
const StatusSchema = z.object({ status_code: z.string().optional() }).passthrough();

export interface InstagramPollOptions {
  maxPolls: number;
  intervalMs: number;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function createInstagramAdapter(poll: InstagramPollOptions = INSTAGRAM_POLL): PublishAdapter {
  const wait = poll.sleep ?? sleep;

  async function waitForContainer(containerId: string, accessToken: string): Promise<void> {
    const url = withQuery(`${GRAPH_BASE}/${containerId}`, { access_token: accessToken, fields: 'status_code' });
    for (let i = 0; i < poll.maxPolls; i++) {
      const { status_code: status } = await requestJson('instagram', url, { method: 'GET' }, StatusSchema);
      if (status === 'FINISHED') return;
      if (status === 'ERROR') throw new ProviderError('instagram', 'Instagram container processing failed');
      await wait(poll.intervalMs);
    }
    // Not finished after the last poll: publish anyway and let the API decide
    logger.warn('Instagram: container still processing after polling', { containerId, polls: poll.maxPolls });
  }

  async function initiate({ videoUrl, caption, accessToken }: PublishRequest) {
    logger.info('Instagram: creating media container');
    const container = await requestJson('instagram', withQuery(`${GRAPH_BASE}/me/media`, { access_token: accessToken }), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        media_type: 'VIDEO',
        video_url:  videoUrl,
        caption:    caption.slice(0, PLATFORM_LIMITS.instagram.captionMax),
      }),
    }, IdSchema);
    const containerId = container.id;
    if (!containerId) throw new ProviderError('instagram', 'No container id from Instagram');

    await waitForContainer(containerId, accessToken);

    const published = await requestJson(
      'instagram',
      withQuery(`${GRAPH_BASE}/me/media_publish`, { access_token: accessToken, creation_id: containerId }),
      { method: 'POST' },
      IdSchema,
    );
    const mediaId = published.id || containerId;
    logger.info('Instagram: Reel published', { containerId, mediaId });
    return { platformPostId: mediaId };
  }

  return { platform: 'instagram', initiate };
}

export const instagramAdapter = createInstagramAdapter();

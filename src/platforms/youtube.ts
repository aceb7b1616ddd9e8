/**
 * YouTube Data API v3 — resumable upload.
 *
 * YouTube does not ingest from a URL, so the video is downloaded here and
 * re-uploaded in a single PUT to the resumable session.
 */
import { z } from 'zod';
import { PLATFORM_LIMITS } from '../config.js';
import { ProviderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseJson, request } from './http.js';
import type { PublishAdapter, PublishRequest } from './types.js';

export const YOUTUBE_UPLOAD_URL =
  'https://www.googleapis.com/upload/youtube/v3/videos?uploadType=resumable&part=snippet,status';

const VideoSchema = z.object({ id: z.string().optional() }).passthrough();

async function initiate({ videoUrl, caption, accessToken }: PublishRequest) {
  const { titleMax, descriptionMax, categoryId } = PLATFORM_LIMITS.youtube;

  const download = await request('youtube', videoUrl, { method: 'GET' });
  const bytes = new Uint8Array(await download.arrayBuffer());
  logger.info('YouTube: starting resumable upload', { bytes: bytes.byteLength });

  const session = await request('youtube', YOUTUBE_UPLOAD_URL, {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${accessToken}`,
      'Content-Type':  'application/json',
    },
    body: JSON.stringify({
      snippet: {
        title:       (caption || 'Video').slice(0, titleMax),
        description: caption.slice(0, descriptionMax),
        categoryId,
      },
      status: { privacyStatus: 'public' },
    }),
  });
  const uploadUrl = session.headers.get('location');
  if (!uploadUrl) throw new ProviderError('youtube', 'YouTube did not return upload URL');

  const uploaded = await request('youtube', uploadUrl, {
    method: 'PUT',
    headers: { 'Content-Type': 'video/mp4' },
    body: bytes,
  });
  const { id } = await parseJson('youtube', uploaded, VideoSchema);
  if (!id) throw new ProviderError('youtube', 'YouTube upload response missing id');

  logger.info('YouTube: video uploaded', { videoId: id });
  return { platformPostId: id };
}

export const youtubeAdapter: PublishAdapter = { platform: 'youtube', initiate };

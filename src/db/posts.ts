/**
 * Post DB operations — one row per (episode, social account) publish attempt.
 * Only the publish task for a post mutates it.
 */
import { z } from 'zod';
import { dbInsert, dbSelect, dbUpdate } from './client.js';
import { ErrorPayloadSchema } from './episodes.js';
import { logger } from '../utils/logger.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export const PostStatusSchema = z.enum(['pending', 'posting', 'posted', 'failed']);

export const PostRowSchema = z.object({
  id:                z.string(),
  episode_id:        z.string(),
  social_account_id: z.string(),
  platform_post_id:  z.string().nullable(),
  status:            PostStatusSchema,
  error:             ErrorPayloadSchema.nullable(),
  posted_at:         z.string().nullable(),
  created_at:        z.string(),
  updated_at:        z.string(),
});

export type PostRecord = z.infer<typeof PostRowSchema>;
export type PostStatus = z.infer<typeof PostStatusSchema>;

export type PostPatch = Partial<Pick<PostRecord, 'status' | 'platform_post_id' | 'error' | 'posted_at'>>;

// ─── Operations ───────────────────────────────────────────────────────────────

export async function insertPendingPost(episodeId: string, socialAccountId: string): Promise<PostRecord> {
  const row = await dbInsert('posts', {
    episode_id:        episodeId,
    social_account_id: socialAccountId,
    platform_post_id:  null,
    status:            'pending',
    error:             null,
    posted_at:         null,
  });
  logger.info('Post created', { id: row['id'], episodeId, socialAccountId });
  return PostRowSchema.parse(row);
}

export async function getPostById(id: string): Promise<PostRecord | null> {
  const rows = await dbSelect('posts', { id });
  const row = rows[0];
  return row ? PostRowSchema.parse(row) : null;
}

export async function listPostsForEpisode(episodeId: string): Promise<PostRecord[]> {
  const rows = await dbSelect('posts', { episode_id: episodeId }, { orderBy: 'created_at' });
  return rows.map(r => PostRowSchema.parse(r));
}

export async function updatePost(id: string, patch: PostPatch): Promise<PostRecord> {
  const row = await dbUpdate('posts', id, patch);
  return PostRowSchema.parse(row);
}

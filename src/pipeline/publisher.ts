/**
 * Publish stage — fans an Episode's final video out to connected social
 * accounts. One Post row and one queue task per account; each Post fails or
 * succeeds on its own.
 */
import { getAssetById } from '../db/assets.js';
import { getEpisodeById, type EpisodeRecord } from '../db/episodes.js';
import { getPostById, insertPendingPost, listPostsForEpisode, updatePost, type PostRecord } from '../db/posts.js';
import { getScriptById } from '../db/scripts.js';
import { getSeriesById } from '../db/series.js';
import {
  getSocialAccountById,
  getWorkspaceAccountsByIds,
  listConnectedAccounts,
  type SocialAccountRecord,
} from '../db/social-accounts.js';
import { getAdapter } from '../platforms/index.js';
import { enqueueTask } from '../queue/index.js';
import { decryptToken } from '../security/token-crypto.js';
import { fetchableUrl, isPlaceholderUrl } from '../storage/object-store.js';
import { errorMessage, PipelineInputError, PlatformHttpError, toErrorPayload } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// ── Trigger ───────────────────────────────────────────────────────────────────

async function resolveTargets(episode: EpisodeRecord, accountIds?: readonly string[]): Promise<SocialAccountRecord[]> {
  const series = await getSeriesById(episode.series_id);
  if (!series) throw new PipelineInputError('Series not found');

  const explicit = accountIds?.length ? accountIds : series.connected_social_account_ids ?? [];
  const accounts = explicit.length
    ? await getWorkspaceAccountsByIds(series.workspace_id, explicit)
    : await listConnectedAccounts(series.workspace_id);
  return accounts.filter(a => a.status === 'connected');
}

/**
 * Creates a pending Post per target account and enqueues its publish task.
 * Targets: `accountIds`, else the Series' connected ids, else every
 * connected account in the workspace.
 */
export async function publishEpisode(episodeId: string, accountIds?: readonly string[]): Promise<PostRecord[]> {
  const episode = await getEpisodeById(episodeId);
  if (!episode) throw new PipelineInputError('Episode not found');
  if (!episode.video_asset_id) throw new PipelineInputError('Episode has no video; run render first');

  const targets = await resolveTargets(episode, accountIds);
  if (targets.length === 0) {
    logger.warn('Publish: no connected accounts to publish to', { episodeId });
    return [];
  }

  const posts: PostRecord[] = [];
  for (const account of targets) {
    const post = await insertPendingPost(episode.id, account.id);
    enqueueTask('post.publish', { postId: post.id });
    posts.push(post);
  }
  logger.info('Publish: posts queued', { episodeId, posts: posts.length });
  return posts;
}

// ── Per-post task ─────────────────────────────────────────────────────────────

class PublishPrecheckError extends Error {}

/** Worth another queue attempt: 5xx, rate limiting, network failure. */
function isTransient(err: unknown): boolean {
  if (err instanceof PlatformHttpError) return err.status >= 500 || err.status === 429;
  return err instanceof TypeError;
}

async function failPost(post: PostRecord, err: unknown): Promise<PostRecord> {
  const failed = await updatePost(post.id, { status: 'failed', error: toErrorPayload('publish', err) });
  logger.error('Publish: post failed', { postId: post.id, error: errorMessage(err) });
  return failed;
}

interface PublishJob {
  episode: EpisodeRecord;
  account: SocialAccountRecord;
  accessToken: string;
  videoUrl: string;
}

async function prepare(post: PostRecord): Promise<PublishJob> {
  const episode = await getEpisodeById(post.episode_id);
  if (!episode) throw new PublishPrecheckError('Episode not found');
  if (!episode.video_asset_id) throw new PublishPrecheckError('Episode has no video; run render first');

  const video = await getAssetById(episode.video_asset_id);
  if (!video) throw new PublishPrecheckError('Video asset not found');

  const account = await getSocialAccountById(post.social_account_id);
  if (!account) throw new PublishPrecheckError('Social account not found');

  const accessToken = decryptToken(account.access_token);
  if (!accessToken) throw new PublishPrecheckError('Missing or invalid access token');

  if (isPlaceholderUrl(video.url)) {
    throw new PublishPrecheckError('Video URL not available (storage not configured or placeholder)');
  }
  return { episode, account, accessToken, videoUrl: fetchableUrl(video.url) };
}

/**
 * Publishes one Post. Precondition failures mark it `failed` without
 * touching any platform. Platform failures mark it `failed` too; transient
 * ones are re-raised so the queue retries the task.
 */
export async function runPublishTask(postId: string): Promise<PostRecord> {
  const post = await getPostById(postId);
  if (!post) throw new PipelineInputError(`Post ${postId} not found`);
  if (post.status === 'posted') {
    logger.info('Publish: post already published, skipping', { postId });
    return post;
  }

  let job: PublishJob;
  try {
    job = await prepare(post);
  } catch (err) {
    if (!(err instanceof PublishPrecheckError)) throw err;
    return failPost(post, err);
  }

  const adapter = getAdapter(job.account.platform);
  if (!adapter) {
    return failPost(post, new PublishPrecheckError(`Unsupported platform: ${job.account.platform}`));
  }

  await updatePost(post.id, { status: 'posting', error: null });
  const script = job.episode.script_id ? await getScriptById(job.episode.script_id) : null;

  try {
    const { platformPostId } = await adapter.initiate({
      videoUrl:    job.videoUrl,
      caption:     script?.text ?? '',
      accessToken: job.accessToken,
    });
    const posted = await updatePost(post.id, {
      status:           'posted',
      platform_post_id: platformPostId,
      posted_at:        new Date().toISOString(),
      error:            null,
    });
    logger.info('Publish: post published', { postId, platform: adapter.platform, platformPostId });
    return posted;
  } catch (err) {
    const failed = await failPost(post, err);
    if (isTransient(err)) throw err;
    return failed;
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

export interface EpisodePostSummary {
  total: number;
  posted: number;
  failed: number;
  inFlight: number;
  /** Every Post reached `posted`. */
  fullyPosted: boolean;
}

export async function summarizeEpisodePosts(episodeId: string): Promise<EpisodePostSummary> {
  const posts = await listPostsForEpisode(episodeId);
  const posted = posts.filter(p => p.status === 'posted').length;
  const failed = posts.filter(p => p.status === 'failed').length;
  return {
    total:       posts.length,
    posted,
    failed,
    inFlight:    posts.length - posted - failed,
    fullyPosted: posts.length > 0 && posted === posts.length,
  };
}

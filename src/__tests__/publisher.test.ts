import { getPostById } from '../db/posts.js';
import { publishEpisode, runPublishTask, summarizeEpisodePosts } from '../pipeline/publisher.js';
import { closeBroker, getBroker } from '../queue/index.js';
import { PipelineInputError, PlatformHttpError } from '../utils/errors.js';
import { seedAccount, seedAsset, seedEpisode, seedPost, seedScript, seedSeries } from './helpers/fixtures.js';
import { resetDb, rowsOf } from './helpers/memory-db.js';

vi.mock('../db/client.js', () => import('./helpers/memory-db.js'));

const fetchMock = vi.fn<typeof fetch>();

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

beforeEach(() => {
  resetDb();
  closeBroker();
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function seedRenderedEpisode(videoUrl?: string) {
  const series = seedSeries();
  const video = seedAsset(videoUrl ? { url: videoUrl } : {});
  const script = seedScript(series.id);
  const episode = seedEpisode(series.id, { status: 'ready_for_review', video_asset_id: video.id, script_id: script.id });
  return { series, episode };
}

// ── Trigger ───────────────────────────────────────────────────────────────────

describe('publishEpisode', () => {
  it('queues one pending post per explicitly chosen account', async () => {
    const { episode } = seedRenderedEpisode();
    const tiktok = seedAccount();
    const youtube = seedAccount({ platform: 'youtube' });
    seedAccount({ platform: 'facebook' });

    const posts = await publishEpisode(episode.id, [youtube.id, tiktok.id]);

    expect(posts.map(p => p.social_account_id)).toEqual([youtube.id, tiktok.id]);
    expect(posts.every(p => p.status === 'pending')).toBe(true);
    expect(getBroker().list('queued').map(t => t.payload)).toEqual(posts.map(p => ({ postId: p.id })));
  });

  it('defaults to the series accounts and drops ones that are not connected', async () => {
    const connected = seedAccount();
    const expired = seedAccount({ platform: 'instagram', status: 'expired' });
    const series = seedSeries({ connected_social_account_ids: [expired.id, connected.id] });
    const video = seedAsset();
    const episode = seedEpisode(series.id, { status: 'ready_for_review', video_asset_id: video.id });

    const posts = await publishEpisode(episode.id);
    expect(posts.map(p => p.social_account_id)).toEqual([connected.id]);
  });

  it('ignores accounts from another workspace', async () => {
    const { episode } = seedRenderedEpisode();
    const foreign = seedAccount({ workspace_id: 'ws-other' });

    expect(await publishEpisode(episode.id, [foreign.id])).toEqual([]);
    expect(getBroker().list('queued')).toEqual([]);
  });

  it('falls back to every connected account in the workspace', async () => {
    const { episode } = seedRenderedEpisode();
    const a = seedAccount();
    const b = seedAccount({ platform: 'facebook' });
    seedAccount({ platform: 'youtube', status: 'error' });

    const posts = await publishEpisode(episode.id);
    expect(posts.map(p => p.social_account_id)).toEqual([a.id, b.id]);
  });

  it('requires a rendered video', async () => {
    const series = seedSeries();
    const episode = seedEpisode(series.id);
    await expect(publishEpisode(episode.id)).rejects.toThrow('Episode has no video; run render first');
    await expect(publishEpisode('missing')).rejects.toBeInstanceOf(PipelineInputError);
  });
});

// ── Per-post task ─────────────────────────────────────────────────────────────

describe('runPublishTask', () => {
  it('publishes with the decrypted token and the script as caption', async () => {
    const { episode } = seedRenderedEpisode();
    const account = seedAccount();
    const post = seedPost(episode.id, account.id);
    fetchMock.mockResolvedValueOnce(json({ data: { publish_id: 'pub-1' }, error: { code: 'ok' } }));

    const result = await runPublishTask(post.id);

    expect(result).toMatchObject({ status: 'posted', platform_post_id: 'pub-1', error: null });
    expect(result.posted_at).not.toBeNull();
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-access-token' });
    expect(JSON.parse(String(init?.body))).toMatchObject({
      post_info:   { title: 'Breathe in. Begin again.' },
      source_info: { video_url: 'https://res.cloudinary.com/demo/video/upload/v1/series-autopilot/video.mp4' },
    });
  });

  it('fails every post without calling a platform when the video URL is a placeholder', async () => {
    const { episode } = seedRenderedEpisode('https://storage.example.com/workspaces/ws-1/episodes/e1/video.mp4');
    const posts = [
      seedPost(episode.id, seedAccount().id),
      seedPost(episode.id, seedAccount({ platform: 'instagram' }).id),
    ];

    for (const post of posts) {
      expect(await runPublishTask(post.id)).toMatchObject({
        status: 'failed',
        error:  { step: 'publish', message: 'Video URL not available (storage not configured or placeholder)' },
      });
    }
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails on a token that cannot be decrypted', async () => {
    const { episode } = seedRenderedEpisode();
    const post = seedPost(episode.id, seedAccount({ access_token: 'not-encrypted' }).id);

    expect((await runPublishTask(post.id)).error).toEqual({ step: 'publish', message: 'Missing or invalid access token' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('fails on a platform it has no adapter for', async () => {
    const { episode } = seedRenderedEpisode();
    const post = seedPost(episode.id, seedAccount({ platform: 'myspace' }).id);

    expect((await runPublishTask(post.id)).error).toEqual({ step: 'publish', message: 'Unsupported platform: myspace' });
  });

  it('records a transient platform failure and re-raises it for the queue', async () => {
    const { episode } = seedRenderedEpisode();
    const post = seedPost(episode.id, seedAccount().id);
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503 }));

    await expect(runPublishTask(post.id)).rejects.toBeInstanceOf(PlatformHttpError);
    expect((await getPostById(post.id))?.error).toEqual({
      step:     'publish',
      message:  'tiktok request failed: HTTP 503 — busy',
      platform: 'tiktok',
      status:   503,
    });
  });

  it('re-raises network failures', async () => {
    const { episode } = seedRenderedEpisode();
    const post = seedPost(episode.id, seedAccount().id);
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(runPublishTask(post.id)).rejects.toThrow('fetch failed');
    expect((await getPostById(post.id))?.status).toBe('failed');
  });

  it('settles a rejected request without a retry', async () => {
    const { episode } = seedRenderedEpisode();
    const post = seedPost(episode.id, seedAccount().id);
    fetchMock.mockResolvedValueOnce(new Response('bad caption', { status: 400 }));

    const result = await runPublishTask(post.id);
    expect(result.status).toBe('failed');
    expect(result.error).toMatchObject({ platform: 'tiktok', status: 400 });
  });

  it('leaves a published post alone', async () => {
    const { episode } = seedRenderedEpisode();
    const post = seedPost(episode.id, seedAccount().id, { status: 'posted', platform_post_id: 'pub-0' });

    expect(await runPublishTask(post.id)).toMatchObject({ status: 'posted', platform_post_id: 'pub-0' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects an unknown post', async () => {
    await expect(runPublishTask('posts-404')).rejects.toThrow('Post posts-404 not found');
  });
});

// ── Summary ───────────────────────────────────────────────────────────────────

describe('summarizeEpisodePosts', () => {
  it('counts posts by outcome', async () => {
    const { episode } = seedRenderedEpisode();
    const account = seedAccount();
    seedPost(episode.id, account.id, { status: 'posted' });
    seedPost(episode.id, account.id, { status: 'failed' });
    seedPost(episode.id, account.id, { status: 'posting' });

    expect(await summarizeEpisodePosts(episode.id)).toEqual({
      total: 3, posted: 1, failed: 1, inFlight: 1, fullyPosted: false,
    });
    expect(rowsOf('posts')).toHaveLength(3);
  });

  it('is fully posted only when every post is', async () => {
    const { episode } = seedRenderedEpisode();
    const account = seedAccount();
    expect((await summarizeEpisodePosts(episode.id)).fullyPosted).toBe(false);
    seedPost(episode.id, account.id, { status: 'posted' });
    expect((await summarizeEpisodePosts(episode.id)).fullyPosted).toBe(true);
  });
});

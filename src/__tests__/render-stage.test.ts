import { writeFileSync } from 'node:fs';
import { getEpisodeById } from '../db/episodes.js';
import { concatenateClips, mixAudioBed, probeDurationSeconds, renderKenBurnsSegment } from '../media/ffmpeg.js';
import { planSegments, totalDuration } from '../pipeline/assembler.js';
import { runEpisodeStage } from '../pipeline/workflow.js';
import { closeBroker, getBroker } from '../queue/index.js';
import { downloadObject, storeObject } from '../storage/object-store.js';
import { seedAccount, seedAsset, seedEpisode, seedSeries } from './helpers/fixtures.js';
import { resetDb, rowsOf } from './helpers/memory-db.js';

vi.mock('../db/client.js', () => import('./helpers/memory-db.js'));
vi.mock('../media/ffmpeg.js', async importOriginal => ({
  ...await importOriginal<typeof import('../media/ffmpeg.js')>(),
  probeDurationSeconds: vi.fn(),
  renderKenBurnsSegment: vi.fn(),
  concatenateClips: vi.fn(),
  mixAudioBed: vi.fn(),
}));
vi.mock('../storage/object-store.js', async importOriginal => ({
  ...await importOriginal<typeof import('../storage/object-store.js')>(),
  storeObject: vi.fn(),
  downloadObject: vi.fn(),
}));

const mockSegment = vi.mocked(renderKenBurnsSegment);
const mockConcat = vi.mocked(concatenateClips);
const mockMix = vi.mocked(mixAudioBed);
const mockProbe = vi.mocked(probeDurationSeconds);
const mockStore = vi.mocked(storeObject);
const mockDownload = vi.mocked(downloadObject);

beforeEach(() => {
  resetDb();
  closeBroker();
  vi.clearAllMocks();
  mockSegment.mockImplementation(async input => writeFileSync(input.outputPath, 'segment'));
  mockConcat.mockImplementation(async (_clips, outputPath) => writeFileSync(outputPath, 'concat'));
  mockMix.mockImplementation(async (_video, _bed, _db, outputPath) => writeFileSync(outputPath, 'mixed'));
  mockProbe.mockResolvedValue(null);
  mockDownload.mockResolvedValue(Buffer.from('downloaded'));
  mockStore.mockImplementation(async key => `https://cdn.test/${key}`);
});

function seedAudio(durationSeconds: number | null = null) {
  return seedAsset({ type: 'audio', format: 'audio/mpeg', url: 'https://cdn.test/voice.mp3', duration_seconds: durationSeconds });
}

function seedImage(workspaceId = 'ws-1') {
  return seedAsset({ type: 'image', format: 'image/png', url: 'https://cdn.test/scene.png', workspace_id: workspaceId });
}

describe('render stage', () => {
  it('renders scenes in order, mixes music and records the video', async () => {
    const series = seedSeries({ estimated_credits_per_video: 18 });
    const [v1, v2, v3] = [seedAudio(), seedAudio(), seedAudio()];
    const image = seedImage();
    const music = seedAsset({ type: 'music', format: 'audio/mpeg', url: 'https://cdn.test/bed.mp3' });
    const caption = seedAsset({ type: 'caption_file', format: 'srt' });
    const episode = seedEpisode(series.id, {
      status:        'generating',
      lease_stage:   'media',
      lease_task_id: 'task-m',
      lease_version: 2,
      media_manifest: {
        scenes: [
          { image_asset_id: image.id, voice_asset_id: v1.id, duration_seconds: 5 },
          { image_asset_id: null, voice_asset_id: v2.id, duration_seconds: 4.5 },
          { image_asset_id: image.id, voice_asset_id: v3.id, duration_seconds: 3 },
        ],
        caption_asset_id: caption.id,
        music_asset_id:   music.id,
      },
    });

    const result = await runEpisodeStage('render', episode.id, 'task-r');

    expect(mockSegment.mock.calls.map(([input]) => input.durationSeconds)).toEqual([5, 4.5, 3]);
    expect(mockSegment.mock.calls.map(([input]) => input.imagePath?.split('/').at(-1) ?? null)).toEqual([
      'segment_01_image.png',
      null,
      'segment_03_image.png',
    ]);
    expect(mockConcat.mock.calls[0]?.[0].map(p => p.split('/').at(-1))).toEqual([
      'segment_01.mp4',
      'segment_02.mp4',
      'segment_03.mp4',
    ]);
    expect(mockMix).toHaveBeenCalledTimes(1);
    expect(mockMix.mock.calls[0]?.[2]).toBe(-18);

    expect(mockStore).toHaveBeenCalledWith(
      `workspaces/ws-1/episodes/${episode.id}/video.mp4`,
      Buffer.from('mixed'),
      'video/mp4',
    );

    expect(result).toMatchObject({
      status:         'ready_for_review',
      error:          null,
      media_manifest: null,
      credits_used:   18,
      preview_url:    `https://cdn.test/workspaces/ws-1/episodes/${episode.id}/video.mp4`,
      lease_version:  3,
    });
    const video = rowsOf('assets').find(a => a['id'] === result.video_asset_id);
    expect(video).toMatchObject({ type: 'video', duration_seconds: 12.5 });
    expect(getBroker().list('queued')).toEqual([]);
  });

  it('renders a legacy manifest as one segment timed from the voice asset', async () => {
    const series = seedSeries({ estimated_credits_per_video: null });
    const voice = seedAudio(21);
    const caption = seedAsset({ type: 'caption_file', format: 'srt' });
    const episode = seedEpisode(series.id, {
      status:        'generating',
      lease_stage:   'media',
      lease_task_id: 'task-m',
      media_manifest: {
        voice_asset_id:   voice.id,
        music_asset_id:   null,
        caption_asset_id: caption.id,
        image_asset_id:   null,
      },
    });

    const result = await runEpisodeStage('render', episode.id, 'task-r');

    expect(mockSegment).toHaveBeenCalledTimes(1);
    expect(mockSegment.mock.calls[0]?.[0]).toMatchObject({ imagePath: null, durationSeconds: 21 });
    expect(mockConcat).not.toHaveBeenCalled();
    expect(mockMix).not.toHaveBeenCalled();
    expect(mockStore.mock.calls[0]?.[1]).toEqual(Buffer.from('segment'));
    expect(result.credits_used).toBe(18);
  });

  it('paints a black canvas for an image from another workspace', async () => {
    const series = seedSeries();
    const voice = seedAudio();
    const foreign = seedImage('ws-other');
    const caption = seedAsset({ type: 'caption_file', format: 'srt' });
    const episode = seedEpisode(series.id, {
      status:        'generating',
      lease_stage:   'media',
      lease_task_id: 'task-m',
      media_manifest: {
        scenes:           [{ image_asset_id: foreign.id, voice_asset_id: voice.id, duration_seconds: 4 }],
        caption_asset_id: caption.id,
        music_asset_id:   null,
      },
    });

    await runEpisodeStage('render', episode.id, 'task-r');

    expect(mockSegment.mock.calls[0]?.[0].imagePath).toBeNull();
    expect(mockDownload).toHaveBeenCalledTimes(1);
  });

  it('keeps earlier diagnostics when a render fails', async () => {
    mockSegment.mockRejectedValue(new Error('ffmpeg segment failed: invalid data'));
    const series = seedSeries();
    const voice = seedAudio();
    const caption = seedAsset({ type: 'caption_file', format: 'srt' });
    const episode = seedEpisode(series.id, {
      status:      'failed',
      lease_stage: 'render',
      error:       { step: 'render', message: 'earlier failure', attempt_log: 'first try' },
      media_manifest: {
        scenes:           [{ image_asset_id: null, voice_asset_id: voice.id, duration_seconds: 4 }],
        caption_asset_id: caption.id,
        music_asset_id:   null,
      },
    });

    await expect(runEpisodeStage('render', episode.id, 'task-r')).rejects.toThrow('ffmpeg segment failed: invalid data');

    const stored = await getEpisodeById(episode.id);
    expect(stored?.status).toBe('failed');
    expect(stored?.error).toEqual({
      step:        'render',
      message:     'ffmpeg segment failed: invalid data',
      attempt_log: 'first try',
    });
    expect(stored?.media_manifest).not.toBeNull();
  });

  it('refuses to render without a manifest', async () => {
    const series = seedSeries();
    const episode = seedEpisode(series.id, { status: 'failed', lease_stage: 'render' });

    await expect(runEpisodeStage('render', episode.id, 'task-r'))
      .rejects.toThrow('No media assets; run media generation first');
    expect(mockSegment).not.toHaveBeenCalled();
  });

  it('queues a post per connected account when auto-post is on', async () => {
    const account = seedAccount();
    const series = seedSeries({ auto_post_enabled: true, connected_social_account_ids: [account.id] });
    const voice = seedAudio();
    const caption = seedAsset({ type: 'caption_file', format: 'srt' });
    const episode = seedEpisode(series.id, {
      status:        'generating',
      lease_stage:   'media',
      lease_task_id: 'task-m',
      media_manifest: {
        scenes:           [{ image_asset_id: null, voice_asset_id: voice.id, duration_seconds: 4 }],
        caption_asset_id: caption.id,
        music_asset_id:   null,
      },
    });

    await runEpisodeStage('render', episode.id, 'task-r');

    const posts = rowsOf('posts');
    expect(posts).toHaveLength(1);
    expect(posts[0]).toMatchObject({ episode_id: episode.id, social_account_id: account.id, status: 'pending' });
    expect(getBroker().list('queued').map(t => [t.name, t.payload])).toEqual([
      ['post.publish', { postId: posts[0]?.['id'] }],
    ]);
  });
});

describe('planSegments', () => {
  it('leaves legacy durations to the probe', () => {
    expect(planSegments({
      voice_asset_id:   'a1',
      music_asset_id:   null,
      caption_asset_id: 'a2',
      image_asset_id:   'a3',
    })).toEqual([{ voiceAssetId: 'a1', imageAssetId: 'a3', durationSeconds: null }]);
  });
});

describe('totalDuration', () => {
  it('sums at millisecond precision', () => {
    expect(totalDuration([0.1, 0.2])).toBe(0.3);
    expect(totalDuration([4.2, 3.1, 5])).toBe(12.3);
    expect(totalDuration([])).toBe(0);
  });
});

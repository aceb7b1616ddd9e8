/**
 * Assembler — turns the media manifest into the final vertical video.
 *
 * One Ken Burns segment per scene (black canvas when the scene has no
 * image), stream-copy concat in scene order, optional music bed, then a
 * single upload recorded as the episode's video asset.
 */
import { readFile, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { PIPELINE, RENDER } from '../config.js';
import { getAssetsByIds, insertAsset, type AssetRecord } from '../db/assets.js';
import { isSceneManifest, type EpisodeRecord, type MediaManifest } from '../db/episodes.js';
import { getSeriesById } from '../db/series.js';
import {
  concatenateClips,
  mixAudioBed,
  probeDurationSeconds,
  renderKenBurnsSegment,
  workDir,
} from '../media/ffmpeg.js';
import { downloadObject, storeObject } from '../storage/object-store.js';
import { errorMessage, PipelineInputError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { estimateCreditsPerEpisode } from './credits.js';
import type { EpisodeLease } from './lifecycle.js';

// ── Plan ──────────────────────────────────────────────────────────────────────

export interface SegmentPlan {
  voiceAssetId: string;
  imageAssetId: string | null;
  /** Known from the manifest in scene mode; probed from the audio in legacy mode. */
  durationSeconds: number | null;
}

export function planSegments(manifest: MediaManifest): SegmentPlan[] {
  if (isSceneManifest(manifest)) {
    return manifest.scenes.map(s => ({
      voiceAssetId:    s.voice_asset_id,
      imageAssetId:    s.image_asset_id,
      durationSeconds: s.duration_seconds,
    }));
  }
  return [{ voiceAssetId: manifest.voice_asset_id, imageAssetId: manifest.image_asset_id, durationSeconds: null }];
}

/** Sum of segment durations at millisecond precision. */
export function totalDuration(durations: readonly number[]): number {
  return Math.round(durations.reduce((sum, d) => sum + d, 0) * 1000) / 1000;
}

const EXTENSIONS: Record<string, string> = {
  'audio/mpeg': 'mp3',
  'audio/mp3':  'mp3',
  'audio/wav':  'wav',
  'audio/aac':  'aac',
  'image/png':  'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
};

function extensionFor(asset: AssetRecord, fallback: string): string {
  const format = asset.format ?? '';
  return EXTENSIONS[format] ?? (/^[a-z0-9]{2,4}$/i.test(format) ? format : fallback);
}

async function fetchToFile(asset: AssetRecord, dir: string, name: string, fallbackExt: string): Promise<string> {
  const filePath = path.join(dir, `${name}.${extensionFor(asset, fallbackExt)}`);
  await writeFile(filePath, await downloadObject(asset.url));
  return filePath;
}

// ── Stage ─────────────────────────────────────────────────────────────────────

export async function runRenderStage(lease: EpisodeLease): Promise<EpisodeRecord> {
  const episode = lease.episode;
  const manifest = episode.media_manifest;
  if (!manifest) throw new PipelineInputError('No media assets; run media generation first');
  const series = await getSeriesById(episode.series_id);
  if (!series) throw new PipelineInputError(`Series ${episode.series_id} not found`);

  const plan = planSegments(manifest);
  const assetIds = plan.flatMap(p => (p.imageAssetId ? [p.voiceAssetId, p.imageAssetId] : [p.voiceAssetId]));
  if (manifest.music_asset_id) assetIds.push(manifest.music_asset_id);
  const assets = await getAssetsByIds(assetIds);

  const dir = workDir('episodes', episode.id, `render_${lease.version}`);
  logger.info('Assembler: rendering', { episodeId: episode.id, segments: plan.length, dir });

  try {
    const segmentPaths: string[] = [];
    const durations: number[] = [];

    for (const [i, segment] of plan.entries()) {
      const name = `segment_${String(i + 1).padStart(2, '0')}`;
      const voice = assets.get(segment.voiceAssetId);
      if (!voice) throw new PipelineInputError(`Voice asset ${segment.voiceAssetId} not found`);
      const audioPath = await fetchToFile(voice, dir, `${name}_voice`, 'mp3');

      let imagePath: string | null = null;
      const image = segment.imageAssetId ? assets.get(segment.imageAssetId) : undefined;
      if (image && image.workspace_id === voice.workspace_id) {
        try {
          imagePath = await fetchToFile(image, dir, `${name}_image`, 'png');
        } catch (err) {
          logger.warn('Assembler: image unavailable — black canvas', { episodeId: episode.id, segment: i + 1, error: errorMessage(err) });
        }
      }

      const durationSeconds = segment.durationSeconds
        ?? await probeDurationSeconds(audioPath)
        ?? voice.duration_seconds
        ?? PIPELINE.defaultLegacySeconds;

      const outputPath = path.join(dir, `${name}.mp4`);
      await renderKenBurnsSegment({ imagePath, audioPath, durationSeconds, outputPath });
      segmentPaths.push(outputPath);
      durations.push(durationSeconds);
    }

    let outputPath = segmentPaths[0];
    if (!outputPath) throw new PipelineInputError('Media manifest has no segments');
    if (segmentPaths.length > 1) {
      outputPath = path.join(dir, 'concat.mp4');
      await concatenateClips(segmentPaths, outputPath);
    }

    const music = manifest.music_asset_id ? assets.get(manifest.music_asset_id) : undefined;
    if (music) {
      const bedPath = await fetchToFile(music, dir, 'music', 'mp3');
      const mixedPath = path.join(dir, 'final.mp4');
      await mixAudioBed(outputPath, bedPath, RENDER.musicBedDb, mixedPath);
      outputPath = mixedPath;
    } else if (manifest.music_asset_id) {
      logger.warn('Assembler: music asset missing — skipping bed', { musicAssetId: manifest.music_asset_id });
    }

    const duration = totalDuration(durations);
    const bytes = await readFile(outputPath);
    const url = await storeObject(
      `workspaces/${series.workspace_id}/episodes/${episode.id}/video.mp4`,
      bytes,
      'video/mp4',
    );
    const video = await insertAsset({
      workspace_id:     series.workspace_id,
      type:             'video',
      source:           'generated',
      url,
      format:           'video/mp4',
      duration_seconds: duration,
      metadata:         { episode_id: episode.id, segments: plan.length, music: Boolean(music) },
    });

    const updated = await lease.commit({
      video_asset_id: video.id,
      preview_url:    url,
      status:         'ready_for_review',
      error:          null,
      media_manifest: null,
      credits_used:   series.estimated_credits_per_video ?? estimateCreditsPerEpisode(series),
    });
    logger.info('Assembler: video ready', { episodeId: episode.id, videoAssetId: video.id, duration });
    return updated;
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

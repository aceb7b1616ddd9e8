/**
 * Producer — narration audio and cover images for one episode.
 *
 * Scene mode: one TTS clip and one image per scene. Legacy mode: one clip of
 * the whole script and one cover. Audio failures abort the stage; image
 * failures degrade that scene to a black canvas at render time.
 *
 * Every run writes fresh assets and a complete new manifest. The claim in
 * lifecycle.ts clears the previous manifest, so render never sees a mix of
 * two runs.
 */
import { rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { generateImage } from '../ai/images.js';
import { synthesizeSpeech, voiceIdFor, type TtsVoice } from '../ai/voice.js';
import { PIPELINE } from '../config.js';
import { getAssetById, insertAsset } from '../db/assets.js';
import type { EpisodeRecord, LegacyManifest, MediaManifest, SceneMedia } from '../db/episodes.js';
import { getScriptById } from '../db/scripts.js';
import { getSeriesById, type SeriesRecord } from '../db/series.js';
import { buildSrt, type CaptionCue } from '../media/captions.js';
import { probeDurationSeconds, workDir } from '../media/ffmpeg.js';
import { storeObject } from '../storage/object-store.js';
import { ContentPolicyError, errorMessage, PipelineInputError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { EpisodeLease } from './lifecycle.js';
import type { Scene } from './scene-validator.js';

// ── Image prompts ─────────────────────────────────────────────────────────────

const NO_TEXT_PREFIX = 'Create an image with zero readable text. Do not include any writing of any kind. ';

const IMAGE_STYLE_SUFFIX =
  ' Cinematic dramatic lighting, professional color grading, vertical composition 9:16. ' +
  'Family-friendly, PG-13 only, no gore, no graphic violence, no weapons, no nudity. ' +
  'Absolutely no letters, words, subtitles, captions, signage, watermarks, UI, or symbols.';

export const SAFE_FALLBACK_PROMPT =
  'Soft, abstract atmospheric background with gentle gradients and subtle light rays, ' +
  'no characters, no creatures, no text, no symbols, no violence, family-friendly. ' +
  'Vertical 9:16 composition, cinematic lighting.';

function styleSuffix(artStyle: string | null | undefined): string {
  const style = artStyle ? artStyle.replace(/_/g, ' ') : 'photorealistic, film grain, shallow depth of field';
  return ` Art style: ${style}.${IMAGE_STYLE_SUFFIX}`;
}

export function buildScenePrompt(visualDescription: string, artStyle?: string | null): string {
  const desc = visualDescription.trim().slice(0, 400) || 'atmospheric cinematic moment, moody lighting';
  return NO_TEXT_PREFIX + desc + styleSuffix(artStyle);
}

/** Legacy single cover: mood taken from the opening of the script. */
export function buildCoverPrompt(scriptText: string, artStyle?: string | null): string {
  const text = scriptText.trim();
  const snippet = text.length > 800 ? `${text.slice(0, 800).trim()}...` : text;
  const mood = snippet
    ? `Background for a short vertical video. Theme or mood of the video: ${snippet}`
    : 'Soft gradient sky and distant mountains';
  return NO_TEXT_PREFIX + mood + styleSuffix(artStyle);
}

/**
 * Image bytes, or null. A content-policy refusal gets one more try with
 * SAFE_FALLBACK_PROMPT; any other failure gives up on the image.
 */
export async function generateCoverImage(prompt: string, label: string): Promise<Buffer | null> {
  if (!PIPELINE.sceneImages) return null;
  try {
    return await generateImage(prompt);
  } catch (err) {
    if (!(err instanceof ContentPolicyError)) {
      logger.warn('Producer: image failed — continuing without it', { label, error: errorMessage(err) });
      return null;
    }
    logger.warn('Producer: image prompt refused — trying fallback prompt', { label });
  }
  try {
    return await generateImage(SAFE_FALLBACK_PROMPT);
  } catch (err) {
    logger.warn('Producer: fallback image failed — continuing without it', { label, error: errorMessage(err) });
    return null;
  }
}

// ── Helpers ───────────────────────────────────────────────────────────────────

async function probeOr(filePath: string, fallbackSeconds: number): Promise<number> {
  try {
    return await probeDurationSeconds(filePath) ?? fallbackSeconds;
  } catch (err) {
    logger.warn('Producer: duration probe failed — using default', { filePath, fallbackSeconds, error: errorMessage(err) });
    return fallbackSeconds;
  }
}

/**
 * Music from the series settings: an uploaded track wins over a library
 * pick. Only a `music` asset in the series' own workspace is accepted.
 */
export async function resolveMusicAsset(series: SeriesRecord): Promise<string | null> {
  const settings = series.music_settings;
  for (const assetId of [settings?.customUploadAssetId, settings?.libraryTrackId]) {
    if (!assetId) continue;
    const asset = await getAssetById(assetId);
    if (asset && asset.workspace_id === series.workspace_id && asset.type === 'music') return asset.id;
    logger.warn('Producer: music asset rejected', { seriesId: series.id, assetId });
  }
  return null;
}

interface MediaContext {
  episode: EpisodeRecord;
  series: SeriesRecord;
  voice: TtsVoice;
  dir: string;
  keyPrefix: string;
}

async function produceVoice(
  ctx: MediaContext,
  text: string,
  name: string,
  fallbackSeconds: number,
  metadata: Record<string, unknown>,
): Promise<{ assetId: string; durationSeconds: number }> {
  const audio = await synthesizeSpeech(text, ctx.voice);
  const localPath = path.join(ctx.dir, `${name}.mp3`);
  await writeFile(localPath, audio);
  const durationSeconds = await probeOr(localPath, fallbackSeconds);

  const url = await storeObject(`${ctx.keyPrefix}/${name}.mp3`, audio, 'audio/mpeg');
  const asset = await insertAsset({
    workspace_id:     ctx.series.workspace_id,
    type:             'audio',
    source:           'generated',
    url,
    format:           'audio/mpeg',
    duration_seconds: durationSeconds,
    metadata:         { episode_id: ctx.episode.id, ...metadata },
  });
  return { assetId: asset.id, durationSeconds };
}

async function produceImage(
  ctx: MediaContext,
  prompt: string,
  name: string,
  metadata: Record<string, unknown>,
): Promise<string | null> {
  const bytes = await generateCoverImage(prompt, name);
  if (!bytes) return null;
  const url = await storeObject(`${ctx.keyPrefix}/${name}.png`, bytes, 'image/png');
  const asset = await insertAsset({
    workspace_id:     ctx.series.workspace_id,
    type:             'image',
    source:           'generated',
    url,
    format:           'image/png',
    duration_seconds: null,
    metadata:         { episode_id: ctx.episode.id, ...metadata },
  });
  return asset.id;
}

async function produceCaptions(ctx: MediaContext, cues: CaptionCue[], scriptText: string): Promise<string> {
  const srt = buildSrt(cues);
  const url = await storeObject(`${ctx.keyPrefix}/captions.srt`, Buffer.from(srt, 'utf-8'), 'application/x-subrip');
  const asset = await insertAsset({
    workspace_id:     ctx.series.workspace_id,
    type:             'caption_file',
    source:           'generated',
    url,
    format:           'srt',
    duration_seconds: null,
    metadata:         { episode_id: ctx.episode.id, text: scriptText.slice(0, PIPELINE.captionTextMax) },
  });
  return asset.id;
}

// ── Modes ─────────────────────────────────────────────────────────────────────

async function produceScenes(ctx: MediaContext, scenes: readonly Scene[], scriptText: string): Promise<MediaManifest> {
  const artStyle = ctx.series.art_style?.style;
  const entries: SceneMedia[] = [];
  const cues: CaptionCue[] = [];

  for (const scene of scenes) {
    const name = `scene_${String(scene.scene).padStart(2, '0')}`;
    const voice = await produceVoice(ctx, scene.text, `${name}_voice`, PIPELINE.defaultSceneSeconds, {
      role: 'scene_voice',
      scene_index: scene.scene,
    });
    const imageAssetId = await produceImage(ctx, buildScenePrompt(scene.visual_description, artStyle), name, {
      role: 'scene_cover',
      scene_index: scene.scene,
    });
    entries.push({
      image_asset_id:   imageAssetId,
      voice_asset_id:   voice.assetId,
      duration_seconds: voice.durationSeconds,
    });
    cues.push({ text: scene.text, durationSeconds: voice.durationSeconds });
    logger.debug('Producer: scene ready', { episodeId: ctx.episode.id, scene: scene.scene, hasImage: imageAssetId !== null });
  }

  return {
    scenes:           entries,
    caption_asset_id: await produceCaptions(ctx, cues, scriptText),
    music_asset_id:   await resolveMusicAsset(ctx.series),
  };
}

async function produceLegacy(ctx: MediaContext, scriptText: string): Promise<LegacyManifest> {
  const voice = await produceVoice(ctx, scriptText, 'voice', PIPELINE.defaultLegacySeconds, { role: 'voice' });
  const imageAssetId = await produceImage(
    ctx,
    buildCoverPrompt(scriptText, ctx.series.art_style?.style),
    'cover',
    { role: 'video_cover' },
  );
  return {
    voice_asset_id:   voice.assetId,
    music_asset_id:   await resolveMusicAsset(ctx.series),
    caption_asset_id: await produceCaptions(ctx, [{ text: scriptText, durationSeconds: voice.durationSeconds }], scriptText),
    image_asset_id:   imageAssetId,
  };
}

// ── Stage ─────────────────────────────────────────────────────────────────────

export async function runMediaStage(lease: EpisodeLease): Promise<EpisodeRecord> {
  const episode = lease.episode;
  const series = await getSeriesById(episode.series_id);
  if (!series) throw new PipelineInputError(`Series ${episode.series_id} not found`);
  const script = episode.script_id ? await getScriptById(episode.script_id) : null;
  if (!script || !script.text.trim()) throw new PipelineInputError('Episode has no script text');

  const useScenes = PIPELINE.sceneMode && (script.scenes?.length ?? 0) > 0;
  const ctx: MediaContext = {
    episode,
    series,
    voice:     voiceIdFor(series.voice_language),
    dir:       workDir('episodes', episode.id, `media_${lease.version}`),
    keyPrefix: `workspaces/${series.workspace_id}/episodes/${episode.id}`,
  };
  logger.info('Producer: generating media', {
    episodeId: episode.id,
    mode: useScenes ? 'scenes' : 'legacy',
    scenes: script.scenes?.length ?? null,
    voice: ctx.voice,
  });

  try {
    const manifest = useScenes && script.scenes
      ? await produceScenes(ctx, script.scenes, script.text)
      : await produceLegacy(ctx, script.text);
    const updated = await lease.commit({ media_manifest: manifest });
    logger.info('Producer: media ready', { episodeId: episode.id, musicAssetId: manifest.music_asset_id });
    return updated;
  } finally {
    await rm(ctx.dir, { recursive: true, force: true });
  }
}

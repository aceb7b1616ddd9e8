/**
 * Scriptwriter — narration for one episode, scene-segmented or monolithic
 * depending on USE_SCENE_BASED_VIDEO.
 *
 * Runs under an episode lease (see lifecycle.ts); the workflow runner owns
 * the claim and the failure record.
 */
import { generateText, type TextRequest } from '../ai/claude.js';
import { PIPELINE } from '../config.js';
import type { EpisodeRecord } from '../db/episodes.js';
import { insertScript } from '../db/scripts.js';
import { getSeriesById, type SeriesRecord } from '../db/series.js';
import { PipelineInputError, ScriptValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { EpisodeLease } from './lifecycle.js';
import { joinSceneText, scenesFromModelOutput, type Scene } from './scene-validator.js';

// ── Prompts ───────────────────────────────────────────────────────────────────

const SCRIPT_THEMES: Record<string, string> = {
  motivation: 'inspiring motivational short-form video',
  horror:     'suspenseful horror story',
  finance:    'educational finance tip',
  ai_tech:    'engaging AI and technology explainer',
  kids:       'fun, educational content for children',
  anime:      'anime-style narrative',
  custom:     'custom content',
};

const MONOLITHIC_SYSTEM_PROMPT =
  'You are a professional scriptwriter for short-form video content. ' +
  'Create engaging, concise scripts optimized for social media platforms.';

const SCENES_SYSTEM_PROMPT =
  'You are a professional scriptwriter for short vertical videos (Reels/TikTok). ' +
  'Output ONLY a valid JSON array of scenes. No markdown, no code fence, no explanation.';

export const DEFAULT_LANGUAGE = 'en-US';

function themeFor(series: SeriesRecord): string {
  const theme = SCRIPT_THEMES[series.content_type] ?? 'short-form video';
  const topic = series.custom_topic?.topicTitle;
  return series.content_type === 'custom' && topic ? `custom: ${topic}` : theme;
}

function lengthFor(series: SeriesRecord): string {
  return series.script_preferences?.storyLength === '45_60' ? '45-60' : '30-40';
}

/** Preference lines shared by both prompt shapes. */
function preferenceLines(series: SeriesRecord): string[] {
  const lines: string[] = [];
  const topic = series.custom_topic;
  if (series.content_type === 'custom' && topic) {
    if (topic.targetAudience) lines.push(`Target audience: ${topic.targetAudience}`);
    if (topic.tone) lines.push(`Tone: ${topic.tone}`);
    if (topic.keywords?.length) lines.push(`Keywords to include: ${topic.keywords.join(', ')}`);
    if (topic.ctaStyle) lines.push(`Call-to-action style: ${topic.ctaStyle}`);
  }
  const prefs = series.script_preferences;
  if (prefs?.tone) lines.push(`Tone: ${prefs.tone}`);
  if (prefs?.hookStrength) lines.push(`Hook strength: ${prefs.hookStrength}`);
  if (prefs?.includeCta && prefs.ctaText) lines.push(`Include call-to-action: ${prefs.ctaText}`);
  return lines;
}

export function buildScenesPrompt(series: SeriesRecord, languageCode: string): TextRequest {
  const parts = [
    `Create a ${themeFor(series)} script for ${lengthFor(series)} seconds of spoken content.`,
    `Split it into exactly ${PIPELINE.scenesMin} to ${PIPELINE.scenesMax} short scenes.`,
    'For each scene provide: "scene" (1-based index), ' +
      '"text" (the exact narration for that scene, one or two sentences), ' +
      '"visual_description" (short cinematic visual for that moment: setting, mood. ' +
      'MUST contain no text/letters/words/subtitles/signage/watermarks).',
    'Keep visual_description under 100 words, cinematic and concrete.',
    ...preferenceLines(series),
    'Output a JSON array only, e.g. [{"scene":1,"text":"...","visual_description":"..."}, ...]',
  ];
  if (languageCode !== DEFAULT_LANGUAGE) parts.push(`Language for narration: ${languageCode}.`);
  return { system: SCENES_SYSTEM_PROMPT, prompt: parts.join('\n'), maxTokens: 2_000, temperature: 0.6 };
}

export function buildMonolithicPrompt(series: SeriesRecord, languageCode: string): TextRequest {
  const parts = [
    `Create a ${themeFor(series)} script.`,
    `Length: ${lengthFor(series)} seconds of spoken content`,
    ...preferenceLines(series),
  ];
  if (languageCode !== DEFAULT_LANGUAGE) parts.push(`Language: ${languageCode}`);
  parts.push(
    'Write only the script text, no stage directions or notes. ' +
    'Make it engaging and suitable for a short-form video.',
  );
  return { system: MONOLITHIC_SYSTEM_PROMPT, prompt: parts.join('\n'), maxTokens: 1_000, temperature: 0.7 };
}

// ── Stage ─────────────────────────────────────────────────────────────────────

export async function runScriptStage(lease: EpisodeLease): Promise<EpisodeRecord> {
  const episode = lease.episode;
  const series = await getSeriesById(episode.series_id);
  if (!series) throw new PipelineInputError(`Series ${episode.series_id} not found`);

  const languageCode = series.voice_language?.languageCode ?? DEFAULT_LANGUAGE;
  logger.info('Scriptwriter: writing script', {
    episodeId: episode.id,
    contentType: series.content_type,
    sceneMode: PIPELINE.sceneMode,
  });

  let text: string;
  let scenes: Scene[] | null = null;
  let provider: string;
  let model: string;

  if (PIPELINE.sceneMode) {
    const res = await generateText(buildScenesPrompt(series, languageCode));
    scenes = scenesFromModelOutput(res.text, PIPELINE.scenesMax);
    text = joinSceneText(scenes);
    ({ provider, model } = res);
  } else {
    const res = await generateText(buildMonolithicPrompt(series, languageCode));
    text = res.text.trim();
    if (!text) throw new ScriptValidationError('Script response was empty');
    ({ provider, model } = res);
  }

  const script = await insertScript({
    series_id:       series.id,
    language_code:   languageCode,
    text,
    scenes,
    prompt_metadata: {
      content_type:       series.content_type,
      custom_topic:       series.custom_topic,
      script_preferences: series.script_preferences,
      scene_mode:         PIPELINE.sceneMode,
      provider,
      model,
    },
  });

  const updated = await lease.commit({ script_id: script.id, status: 'ready_for_review', error: null });
  logger.info('Scriptwriter: script ready', { episodeId: episode.id, scriptId: script.id, scenes: scenes?.length ?? null });
  return updated;
}

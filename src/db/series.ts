/**
 * Series DB operations. The wizard (out of scope) writes the JSON settings
 * columns; the pipeline reads them and owns status / auto-post / credits.
 */
import { z } from 'zod';
import { dbSelect, dbUpdate } from './client.js';
import { logger } from '../utils/logger.js';

// ─── Settings schemas ─────────────────────────────────────────────────────────

export const CustomTopicSchema = z.object({
  topicTitle:     z.string().nullish(),
  targetAudience: z.string().nullish(),
  tone:           z.string().nullish(),
  keywords:       z.array(z.string()).nullish(),
  ctaStyle:       z.string().nullish(),
}).passthrough();

export const ScriptPreferencesSchema = z.object({
  storyLength:  z.string().nullish(),   // 30_40 | 45_60
  tone:         z.string().nullish(),
  hookStrength: z.string().nullish(),
  includeCta:   z.boolean().nullish(),
  ctaText:      z.string().nullish(),
}).passthrough();

export const VoiceLanguageSchema = z.object({
  languageCode: z.string().nullish(),
  gender:       z.string().nullish(),   // male | female | neutral
  style:        z.string().nullish(),
  speed:        z.number().nullish(),
  pitch:        z.number().nullish(),
}).passthrough();

export const MusicSettingsSchema = z.object({
  mode:                z.string().nullish(),   // preset | library | custom
  presetMood:          z.string().nullish(),
  libraryTrackId:      z.string().nullish(),
  customUploadAssetId: z.string().nullish(),
  tiktokUrl:           z.string().nullish(),
}).passthrough();

export const ArtStyleSchema = z.object({
  style:      z.string().nullish(),
  intensity:  z.number().nullish(),
  colorTheme: z.record(z.string().nullish()).nullish(),
}).passthrough();

export const VisualEffectSchema = z.object({
  type:      z.string(),
  enabled:   z.boolean().default(true),
  isPremium: z.boolean().default(false),
  params:    z.record(z.unknown()).nullish(),
}).passthrough();

export const ScheduleSettingsSchema = z.object({
  videoDuration: z.string().nullish(),
  frequency:     z.string().nullish(),           // daily | weekly | custom | …
  customDays:    z.array(z.number().int()).nullish(),   // 0 = Monday … 6 = Sunday
  publishTime:   z.string().nullish(),           // HH:MM
  timezone:      z.string().nullish(),
  startDate:     z.string().nullish(),
  active:        z.boolean().nullish(),
}).passthrough();

export const SeriesStatusSchema = z.enum(['draft', 'active', 'paused', 'archived']);

// ─── Row ──────────────────────────────────────────────────────────────────────

export const SeriesRowSchema = z.object({
  id:                            z.string(),
  workspace_id:                  z.string(),
  name:                          z.string(),
  content_type:                  z.string(),   // motivation | horror | finance | ai_tech | kids | anime | custom
  custom_topic:                  CustomTopicSchema.nullable(),
  script_preferences:            ScriptPreferencesSchema.nullable(),
  voice_language:                VoiceLanguageSchema.nullable(),
  music_settings:                MusicSettingsSchema.nullable(),
  art_style:                     ArtStyleSchema.nullable(),
  caption_style:                 z.record(z.unknown()).nullable(),
  visual_effects:                z.array(VisualEffectSchema).nullable(),
  schedule:                      ScheduleSettingsSchema.nullable(),
  connected_social_account_ids:  z.array(z.string()).nullable(),
  status:                        SeriesStatusSchema,
  auto_post_enabled:             z.boolean(),
  estimated_credits_per_video:   z.number().nullable(),
  created_at:                    z.string(),
  updated_at:                    z.string(),
});

export type SeriesRecord = z.infer<typeof SeriesRowSchema>;
export type SeriesStatus = z.infer<typeof SeriesStatusSchema>;
export type ScheduleSettings = z.infer<typeof ScheduleSettingsSchema>;
export type VoiceLanguage = z.infer<typeof VoiceLanguageSchema>;
export type MusicSettings = z.infer<typeof MusicSettingsSchema>;

export type SeriesPatch = Partial<Pick<SeriesRecord,
  'status' | 'auto_post_enabled' | 'estimated_credits_per_video'>>;

// ─── Operations ───────────────────────────────────────────────────────────────

export async function getSeriesById(id: string): Promise<SeriesRecord | null> {
  const rows = await dbSelect('series', { id });
  const row = rows[0];
  return row ? SeriesRowSchema.parse(row) : null;
}

export async function listActiveSeries(): Promise<SeriesRecord[]> {
  const rows = await dbSelect('series', { status: 'active' });
  return rows.map(r => SeriesRowSchema.parse(r));
}

export async function updateSeries(id: string, patch: SeriesPatch): Promise<SeriesRecord> {
  const row = await dbUpdate('series', id, patch);
  logger.info('Series updated', { id, ...patch });
  return SeriesRowSchema.parse(row);
}

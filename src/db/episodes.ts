/**
 * Episode DB operations.
 *
 * Pipeline stages never write an episode with a plain UPDATE: every write goes
 * through `updateEpisodeIfVersion`, conditional on the lease version the
 * stage claimed (see pipeline/lifecycle.ts).
 */
import { z } from 'zod';
import { dbInsert, dbSelect, dbUpdateWhere } from './client.js';
import { logger } from '../utils/logger.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export const EPISODE_STATUSES = [
  'scheduled',
  'generating',
  'ready_for_review',
  'approved',
  'posted',
  'failed',
] as const;

export const EpisodeStatusSchema = z.enum(EPISODE_STATUSES);
export type EpisodeStatus = z.infer<typeof EpisodeStatusSchema>;

export const ErrorPayloadSchema = z.object({
  step:    z.string(),
  message: z.string(),
}).passthrough();

export type EpisodeError = z.infer<typeof ErrorPayloadSchema>;

// ─── Media manifest ───────────────────────────────────────────────────────────

export const SceneMediaSchema = z.object({
  image_asset_id:   z.string().nullable(),
  voice_asset_id:   z.string(),
  duration_seconds: z.number().nonnegative(),
});

export const SceneManifestSchema = z.object({
  scenes:           z.array(SceneMediaSchema).min(1),
  caption_asset_id: z.string(),
  music_asset_id:   z.string().nullable(),
});

export const LegacyManifestSchema = z.object({
  voice_asset_id:   z.string(),
  music_asset_id:   z.string().nullable(),
  caption_asset_id: z.string(),
  image_asset_id:   z.string().nullable(),
});

export const MediaManifestSchema = z.union([SceneManifestSchema, LegacyManifestSchema]);

export type SceneMedia = z.infer<typeof SceneMediaSchema>;
export type SceneManifest = z.infer<typeof SceneManifestSchema>;
export type LegacyManifest = z.infer<typeof LegacyManifestSchema>;
export type MediaManifest = z.infer<typeof MediaManifestSchema>;

export function isSceneManifest(manifest: MediaManifest): manifest is SceneManifest {
  return 'scenes' in manifest;
}

// ─── Row ──────────────────────────────────────────────────────────────────────

export const EpisodeRowSchema = z.object({
  id:              z.string(),
  series_id:       z.string(),
  sequence_number: z.number().int(),
  scheduled_at:    z.string().nullable(),
  status:          EpisodeStatusSchema,
  script_id:       z.string().nullable(),
  video_asset_id:  z.string().nullable(),
  preview_url:     z.string().nullable(),
  error:           ErrorPayloadSchema.nullable(),
  media_manifest:  MediaManifestSchema.nullable(),
  credits_used:    z.number(),
  lease_stage:     z.string().nullable(),
  lease_task_id:   z.string().nullable(),
  lease_version:   z.number().int(),
  created_at:      z.string(),
  updated_at:      z.string(),
});

export type EpisodeRecord = z.infer<typeof EpisodeRowSchema>;

export type NewEpisode = Pick<EpisodeRecord, 'series_id' | 'sequence_number' | 'scheduled_at'>;

export type EpisodePatch = Partial<Pick<EpisodeRecord,
  | 'status'
  | 'script_id'
  | 'video_asset_id'
  | 'preview_url'
  | 'error'
  | 'media_manifest'
  | 'credits_used'
  | 'lease_stage'
  | 'lease_task_id'
  | 'lease_version'>>;

// ─── Operations ───────────────────────────────────────────────────────────────

/** Creates an episode in `scheduled` with an unheld lease. */
export async function insertEpisode(episode: NewEpisode): Promise<EpisodeRecord> {
  const row = await dbInsert('episodes', {
    ...episode,
    status:         'scheduled',
    script_id:      null,
    video_asset_id: null,
    preview_url:    null,
    error:          null,
    media_manifest: null,
    credits_used:   0,
    lease_stage:    null,
    lease_task_id:  null,
    lease_version:  0,
  });
  logger.info('Episode created', {
    id: row['id'],
    seriesId: episode.series_id,
    sequence: episode.sequence_number,
    scheduledAt: episode.scheduled_at,
  });
  return EpisodeRowSchema.parse(row);
}

export async function getEpisodeById(id: string): Promise<EpisodeRecord | null> {
  const rows = await dbSelect('episodes', { id });
  const row = rows[0];
  return row ? EpisodeRowSchema.parse(row) : null;
}

export async function listEpisodesForSeries(seriesId: string): Promise<EpisodeRecord[]> {
  const rows = await dbSelect('episodes', { series_id: seriesId }, { orderBy: 'sequence_number' });
  return rows.map(r => EpisodeRowSchema.parse(r));
}

/** Compare-and-swap on `lease_version`. Returns null when another writer got there first. */
export async function updateEpisodeIfVersion(
  id: string,
  expectedVersion: number,
  patch: EpisodePatch,
): Promise<EpisodeRecord | null> {
  const row = await dbUpdateWhere('episodes', { id, lease_version: expectedVersion }, patch);
  return row ? EpisodeRowSchema.parse(row) : null;
}

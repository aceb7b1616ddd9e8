/**
 * Asset DB operations. Assets are append-only: the pipeline inserts and
 * reads them, never updates or deletes.
 */
import { z } from 'zod';
import { dbInsert, dbSelect, dbSelectIn } from './client.js';
import { logger } from '../utils/logger.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export const AssetTypeSchema = z.enum(['audio', 'image', 'video', 'music', 'caption_file']);
export const AssetSourceSchema = z.enum(['generated', 'uploaded', 'external']);

export const AssetRowSchema = z.object({
  id:               z.string(),
  workspace_id:     z.string(),
  type:             AssetTypeSchema,
  source:           AssetSourceSchema,
  url:              z.string(),
  format:           z.string().nullable(),
  duration_seconds: z.number().nullable(),
  metadata:         z.record(z.unknown()).nullable(),
  created_at:       z.string(),
});

export type AssetRecord = z.infer<typeof AssetRowSchema>;
export type AssetType = z.infer<typeof AssetTypeSchema>;
export type NewAsset = Omit<AssetRecord, 'id' | 'created_at'>;

// ─── Operations ───────────────────────────────────────────────────────────────

export async function insertAsset(asset: NewAsset): Promise<AssetRecord> {
  const row = await dbInsert('assets', asset);
  logger.debug('Asset created', { id: row['id'], type: asset.type, format: asset.format });
  return AssetRowSchema.parse(row);
}

export async function getAssetById(id: string): Promise<AssetRecord | null> {
  const rows = await dbSelect('assets', { id });
  const row = rows[0];
  return row ? AssetRowSchema.parse(row) : null;
}

export async function getAssetsByIds(ids: readonly string[]): Promise<Map<string, AssetRecord>> {
  const rows = await dbSelectIn('assets', 'id', ids);
  const assets = rows.map(r => AssetRowSchema.parse(r));
  return new Map(assets.map(a => [a.id, a]));
}

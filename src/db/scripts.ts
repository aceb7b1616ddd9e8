/**
 * Script DB operations. Scripts are immutable; regeneration inserts a new row
 * and repoints `episodes.script_id`.
 */
import { z } from 'zod';
import { dbInsert, dbSelect } from './client.js';
import { SceneSchema } from '../pipeline/scene-validator.js';
import { logger } from '../utils/logger.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export const ScriptRowSchema = z.object({
  id:              z.string(),
  series_id:       z.string(),
  language_code:   z.string(),
  text:            z.string(),
  scenes:          z.array(SceneSchema).nullable(),
  prompt_metadata: z.record(z.unknown()).nullable(),
  created_at:      z.string(),
});

export type ScriptRecord = z.infer<typeof ScriptRowSchema>;
export type NewScript = Omit<ScriptRecord, 'id' | 'created_at'>;

// ─── Operations ───────────────────────────────────────────────────────────────

export async function insertScript(script: NewScript): Promise<ScriptRecord> {
  const row = await dbInsert('scripts', script);
  logger.info('Script created', {
    id: row['id'],
    seriesId: script.series_id,
    chars: script.text.length,
    scenes: script.scenes?.length ?? null,
  });
  return ScriptRowSchema.parse(row);
}

export async function getScriptById(id: string): Promise<ScriptRecord | null> {
  const rows = await dbSelect('scripts', { id });
  const row = rows[0];
  return row ? ScriptRowSchema.parse(row) : null;
}

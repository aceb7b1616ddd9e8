/**
 * Scene validator — normalizes the untrusted JSON a text model returns for a
 * scene-segmented script.
 *
 * Accepted: a non-empty JSON array of objects, each with non-blank `text`.
 * Scenes are renumbered 1..n in array order (the model's own `scene` numbers
 * are not trusted) and lists longer than `maxScenes` are cut, not rejected.
 */
import { z } from 'zod';
import { PIPELINE } from '../config.js';
import { ScriptValidationError } from '../utils/errors.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export const SceneSchema = z.object({
  scene:              z.number().int().positive(),
  text:               z.string().min(1),
  visual_description: z.string().min(1),
});

export type Scene = z.infer<typeof SceneSchema>;

const RawSceneSchema = z.object({
  text:               z.unknown(),
  visual_description: z.unknown().optional(),
}).passthrough();

// ── Parsing ───────────────────────────────────────────────────────────────────

/** Strip a ```json … ``` fence if the model added one anyway. */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  return trimmed.replace(/^```(?:json)?\s*/i, '').replace(/`+\s*$/, '').trim();
}

export function parseScenesJson(raw: string): unknown {
  try {
    return JSON.parse(stripCodeFence(raw));
  } catch (err) {
    throw new ScriptValidationError('Script scenes response was not valid JSON', { cause: err });
  }
}

// ── Validation ────────────────────────────────────────────────────────────────

export function validateScenes(raw: unknown, maxScenes: number = PIPELINE.scenesMax): Scene[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ScriptValidationError('scenes must be a non-empty list');
  }

  const scenes: Scene[] = raw.map((item: unknown, i) => {
    const parsed = RawSceneSchema.safeParse(item);
    if (!parsed.success) {
      throw new ScriptValidationError(`scene ${i} must be an object`);
    }
    const text = typeof parsed.data.text === 'string' ? parsed.data.text.trim() : '';
    if (!text) throw new ScriptValidationError(`scene ${i} missing 'text'`);

    const visual = typeof parsed.data.visual_description === 'string'
      ? parsed.data.visual_description.trim()
      : '';
    return {
      scene: i + 1,
      text,
      visual_description: visual || text.slice(0, PIPELINE.visualDescriptionMax),
    };
  });

  return scenes.slice(0, Math.max(1, maxScenes));
}

/** Full path from raw model output to validated scenes. */
export function scenesFromModelOutput(raw: string, maxScenes?: number): Scene[] {
  return validateScenes(parseScenesJson(raw), maxScenes);
}

/** Narration text of a scene script, one paragraph per scene. */
export function joinSceneText(scenes: readonly Scene[]): string {
  return scenes.map(s => s.text.trim()).join('\n\n');
}

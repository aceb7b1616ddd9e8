import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const flag = (fallback: 'true' | 'false') =>
  z.string().transform(v => v === 'true' || v === '1').default(fallback);

const EnvSchema = z.object({
  // Database
  SUPABASE_URL:                  z.string().url(),
  SUPABASE_SERVICE_KEY:          z.string().min(1),

  // AI / Generation
  ANTHROPIC_API_KEY:             z.string().min(1),
  OPENAI_API_KEY:                z.string().min(1),
  ANTHROPIC_MODEL:               z.string().default('claude-sonnet-4-6'),
  OPENAI_TEXT_MODEL:             z.string().default('gpt-4o-mini'),
  OPENAI_TTS_MODEL:              z.string().default('tts-1'),
  OPENAI_IMAGE_MODEL:            z.string().default('dall-e-3'),

  // Feature flags
  USE_SCENE_BASED_VIDEO:         flag('true'),
  GENERATE_SCENE_IMAGES:         flag('true'),
  AUTO_ADVANCE_AFTER_SCRIPT:     flag('true'),

  // Script shape
  VIDEO_SCENES_MIN:              z.coerce.number().int().min(1).default(5),
  VIDEO_SCENES_MAX:              z.coerce.number().int().min(1).default(12),

  // Object storage (unset ⇒ placeholder URLs)
  CLOUDINARY_CLOUD_NAME:         z.string().optional(),
  CLOUDINARY_API_KEY:            z.string().optional(),
  CLOUDINARY_API_SECRET:         z.string().optional(),
  STORAGE_URL_TTL_SECONDS:       z.coerce.number().int().positive().default(7200),

  // Social account tokens are stored encrypted with this key
  TOKEN_ENCRYPTION_KEY:          z.string().min(1),

  // Task queue
  QUEUE_DB_PATH:                 z.string().default(`${process.env['HOME'] ?? '/tmp'}/series-autopilot/queue.db`),
  TASK_MAX_ATTEMPTS:             z.coerce.number().int().min(1).default(6),
  TASK_BACKOFF_BASE_MS:          z.coerce.number().int().min(0).default(1_000),
  TASK_BACKOFF_MAX_MS:           z.coerce.number().int().min(0).default(600_000),
  TASK_LEASE_MS:                 z.coerce.number().int().positive().default(900_000),
  WORKER_CONCURRENCY:            z.coerce.number().int().min(1).default(2),
  WORKER_POLL_INTERVAL_MS:       z.coerce.number().int().positive().default(1_000),

  // Scheduling
  SCRIPT_LEAD_HOURS:             z.coerce.number().min(0).default(6),

  // Local media
  TEMP_DIR:                      z.string().default('/tmp/series-autopilot'),
  FFMPEG_PATH:                   z.string().default('ffmpeg'),
  FFPROBE_PATH:                  z.string().default('ffprobe'),
  MUSIC_BED_VOLUME_DB:           z.coerce.number().default(-18),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Pipeline ──────────────────────────────────────────────────────────────────

export const PIPELINE = {
  sceneMode:              env.USE_SCENE_BASED_VIDEO,
  sceneImages:            env.GENERATE_SCENE_IMAGES,
  autoAdvanceAfterScript: env.AUTO_ADVANCE_AFTER_SCRIPT,
  scenesMin:              Math.min(env.VIDEO_SCENES_MIN, env.VIDEO_SCENES_MAX),
  scenesMax:              env.VIDEO_SCENES_MAX,
  // Fallback durations when ffprobe cannot read a narration file
  defaultSceneSeconds:    5,
  defaultLegacySeconds:   30,
  visualDescriptionMax:   500,
  captionTextMax:         2000,
  ttsInputMax:            4096,
} as const;

// ── Render ────────────────────────────────────────────────────────────────────

export const RENDER = {
  width:        1080,
  height:       1920,
  fps:          30,
  zoomFrom:     1.0,
  zoomTo:       1.2,
  preset:       'fast',
  audioBitrate: '128k',
  musicBedDb:   env.MUSIC_BED_VOLUME_DB,
} as const;

// ── Queue ─────────────────────────────────────────────────────────────────────

export const QUEUE = {
  dbPath:         env.QUEUE_DB_PATH,
  maxAttempts:    env.TASK_MAX_ATTEMPTS,
  backoffBaseMs:  env.TASK_BACKOFF_BASE_MS,
  backoffMaxMs:   env.TASK_BACKOFF_MAX_MS,
  leaseMs:        env.TASK_LEASE_MS,
  concurrency:    env.WORKER_CONCURRENCY,
  pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
} as const;

// ── Schedule ──────────────────────────────────────────────────────────────────

export const SCHEDULE = {
  launchBatch:      7,
  topUpBatch:       14,
  horizonDays:      365,
  scriptLeadMs:     env.SCRIPT_LEAD_HOURS * 60 * 60 * 1000,
  defaultTime:      '09:00',
  defaultTimezone:  'UTC',
} as const;

// ── Storage ───────────────────────────────────────────────────────────────────

export const STORAGE = {
  placeholderBase: 'https://storage.example.com',
  urlTtlSeconds:   env.STORAGE_URL_TTL_SECONDS,
  folder:          'series-autopilot',
} as const;

// ── Platform Limits ───────────────────────────────────────────────────────────

export const PLATFORM_LIMITS = {
  tiktok:    { titleMax: 150 },
  instagram: { captionMax: 2200 },
  youtube:   { titleMax: 100, descriptionMax: 5000, categoryId: '22' },
  facebook:  { descriptionMax: 5000 },
} as const;

export const INSTAGRAM_POLL = {
  maxPolls:   30,
  intervalMs: 2_000,
} as const;

export const GRAPH_API_VERSION = 'v21.0';

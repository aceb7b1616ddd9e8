#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for Series Autopilot.
 * Checks required env vars, ffmpeg/ffprobe on PATH, the queue database
 * directory and the Supabase connection.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, note: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  ${note}`);

let anyRequiredFailed = false;

function checkRequired(label: string, value: string | undefined, hint?: string): void {
  if (value && value.trim().length > 0) {
    // Mask secrets: first 6 chars only
    pass(label, value.length > 10 ? `${value.slice(0, 6)}…` : '(set)');
  } else {
    fail(label, hint ?? `Set ${label} in .env`);
    anyRequiredFailed = true;
  }
}

// ── Section: Required environment variables ───────────────────────────────────

console.log(`\n${BOLD}=== Series Autopilot — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Required environment variables${RESET}`);

checkRequired('SUPABASE_URL',         process.env['SUPABASE_URL'],         'Supabase project settings → API');
checkRequired('SUPABASE_SERVICE_KEY', process.env['SUPABASE_SERVICE_KEY'], 'Supabase project settings → API → service_role key');
checkRequired('ANTHROPIC_API_KEY',    process.env['ANTHROPIC_API_KEY'],    'https://console.anthropic.com');
checkRequired('OPENAI_API_KEY',       process.env['OPENAI_API_KEY'],       'https://platform.openai.com/api-keys');
checkRequired('TOKEN_ENCRYPTION_KEY', process.env['TOKEN_ENCRYPTION_KEY'], 'Any long random string; must match the OAuth service');

// ── Section: Optional / configuration variables ───────────────────────────────

console.log(`\n${BOLD}[ 2 ] Optional / configuration variables${RESET}`);

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  console.log(`  ${YELLOW}○${RESET} ${label}  ${value ?? defaultVal}${value ? '' : '  (default)'}`);
}

const cloudinaryKeys = ['CLOUDINARY_CLOUD_NAME', 'CLOUDINARY_API_KEY', 'CLOUDINARY_API_SECRET'];
if (cloudinaryKeys.every(k => process.env[k])) {
  pass('Cloudinary storage', process.env['CLOUDINARY_CLOUD_NAME']);
} else {
  skip('Cloudinary storage', '(not configured — videos get placeholder URLs and cannot be published)');
}
checkOptional('USE_SCENE_BASED_VIDEO',     process.env['USE_SCENE_BASED_VIDEO'],     'true');
checkOptional('GENERATE_SCENE_IMAGES',     process.env['GENERATE_SCENE_IMAGES'],     'true');
checkOptional('AUTO_ADVANCE_AFTER_SCRIPT', process.env['AUTO_ADVANCE_AFTER_SCRIPT'], 'true');
checkOptional('WORKER_CONCURRENCY',        process.env['WORKER_CONCURRENCY'],        '2');
checkOptional('TEMP_DIR',                  process.env['TEMP_DIR'],                  '/tmp/series-autopilot');
checkOptional('LOG_LEVEL',                 process.env['LOG_LEVEL'],                 'info');

// ── Section: Media tools ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Media tools${RESET}`);

function checkTool(label: string, bin: string): void {
  try {
    const out = execFileSync(bin, ['-version'], { encoding: 'utf8', stdio: ['ignore', 'pipe', 'pipe'] });
    pass(label, out.split('\n')[0] ?? bin);
  } catch (err) {
    fail(label, `${bin}: ${err instanceof Error ? err.message : String(err)} — install ffmpeg or set the path in .env`);
    anyRequiredFailed = true;
  }
}

checkTool('ffmpeg',  process.env['FFMPEG_PATH']  ?? 'ffmpeg');
checkTool('ffprobe', process.env['FFPROBE_PATH'] ?? 'ffprobe');

// ── Section: Queue database ───────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Queue database${RESET}`);

const queuePath = process.env['QUEUE_DB_PATH'];
if (!queuePath) {
  skip('QUEUE_DB_PATH', '(default under $HOME/series-autopilot)');
} else if (queuePath === ':memory:') {
  skip('QUEUE_DB_PATH', ':memory: (tasks are lost on restart)');
} else if (existsSync(queuePath)) {
  pass('Queue database', queuePath);
} else {
  skip('Queue database', `${queuePath} (created on first worker start in ${dirname(queuePath)})`);
}

// ── Section: Supabase connection ──────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Supabase connection${RESET}`);

const supabaseUrl = process.env['SUPABASE_URL'];
const supabaseKey = process.env['SUPABASE_SERVICE_KEY'];

if (supabaseUrl && supabaseKey) {
  process.stdout.write('  Testing Supabase connection… ');
  try {
    const sb = createClient(supabaseUrl, supabaseKey);
    const { error } = await sb.from('series').select('id').limit(1);
    if (error) throw new Error(error.message);
    console.log(`${GREEN}✓${RESET}  connected`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Supabase connection failed', `${err instanceof Error ? err.message : String(err)} — run migrations/001_initial.sql`);
    anyRequiredFailed = true;
  }
} else {
  skip('Supabase connection', '(skipped — credentials missing above)');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run worker${RESET}\n`);
}

/**
 * FFmpeg operations for vertical 1080x1920 rendering — Ken Burns segments,
 * concatenation, duration probing and music-bed mixing.
 *
 * Binaries are invoked asynchronously with argument arrays (no shell). A
 * missing binary raises MediaToolMissingError; any other non-zero exit throws
 * with stderr.
 */
import { execFile } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { promisify } from 'node:util';
import { env, RENDER } from '../config.js';
import { MediaToolMissingError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// ── Helpers ────────────────────────────────────────────────────────────────────

function errorField(err: unknown, field: 'code' | 'stderr'): string {
  if (typeof err !== 'object' || err === null || !(field in err)) return '';
  const value: unknown = Reflect.get(err, field);
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return '';
}

const execFileAsync = promisify(execFile);

async function execTool(tool: 'ffmpeg' | 'ffprobe', binary: string, args: string[], label: string): Promise<string> {
  logger.debug(`${tool} [${label}]`, { args: args.join(' ') });
  try {
    const { stdout } = await execFileAsync(binary, args, {
      encoding:  'utf-8',
      maxBuffer: 32 * 1024 * 1024,
    });
    return stdout;
  } catch (err) {
    if (errorField(err, 'code') === 'ENOENT') throw new MediaToolMissingError(tool);
    const stderr = errorField(err, 'stderr').trim();
    throw new Error(`${tool} ${label} failed: ${stderr.slice(-2_000) || String(err)}`);
  }
}

export async function runFfmpeg(args: string[], label: string): Promise<void> {
  await execTool('ffmpeg', env.FFMPEG_PATH, ['-y', ...args], label);
}

/** Seconds with at most millisecond precision, no trailing zeros. */
function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(3)));
}

/** Creates (if needed) and returns a scratch directory under TEMP_DIR. */
export function workDir(...parts: string[]): string {
  const dir = path.join(env.TEMP_DIR, ...parts);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

// ── Probing ────────────────────────────────────────────────────────────────────

/** Container duration in seconds, or null when ffprobe cannot read one. */
export async function probeDurationSeconds(filePath: string): Promise<number | null> {
  let out: string;
  try {
    out = await execTool('ffprobe', env.FFPROBE_PATH, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ], 'probeDuration');
  } catch (err) {
    if (err instanceof MediaToolMissingError) throw err;
    logger.warn('FFprobe: duration unreadable', { filePath, error: err instanceof Error ? err.message : String(err) });
    return null;
  }
  const seconds = parseFloat(out.trim());
  return Number.isFinite(seconds) && seconds > 0 ? seconds : null;
}

// ── Segments ───────────────────────────────────────────────────────────────────

export interface SegmentInput {
  /** Still image to pan over; null renders a black canvas. */
  imagePath: string | null;
  audioPath: string;
  durationSeconds: number;
  outputPath: string;
}

/**
 * Per-frame zoom increment so the zoom travels zoomFrom → zoomTo over the
 * segment. Six decimals, as ffmpeg receives it.
 */
export function zoomIncrement(durationSeconds: number): string {
  const frames = Math.max(1, Math.floor(durationSeconds * RENDER.fps));
  return ((RENDER.zoomTo - RENDER.zoomFrom) / frames).toFixed(6);
}

export function buildSegmentArgs(input: SegmentInput): string[] {
  const { width, height, fps } = RENDER;
  const size = `${width}x${height}`;
  const duration = formatSeconds(input.durationSeconds);

  const videoInput = input.imagePath
    ? ['-loop', '1', '-i', input.imagePath]
    : ['-f', 'lavfi', '-i', `color=c=black:s=${size}:r=${fps}:d=${duration}`];

  const filter = input.imagePath
    ? [
        '-vf',
        `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
        `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,` +
        `zoompan=z='min(zoom+${zoomIncrement(input.durationSeconds)},${RENDER.zoomTo})':d=1:s=${size}:fps=${fps}`,
      ]
    : [];

  return [
    ...videoInput,
    '-i', input.audioPath,
    ...filter,
    '-t', duration,
    '-c:v', 'libx264',
    '-preset', RENDER.preset,
    '-pix_fmt', 'yuv420p',
    '-c:a', 'aac',
    '-b:a', RENDER.audioBitrate,
    '-shortest',
    input.outputPath,
  ];
}

export async function renderKenBurnsSegment(input: SegmentInput): Promise<void> {
  logger.debug('FFmpeg: rendering segment', {
    outputPath: input.outputPath,
    durationSeconds: input.durationSeconds,
    hasImage: input.imagePath !== null,
  });
  await runFfmpeg(buildSegmentArgs(input), 'segment');
}

// ── Assembly ───────────────────────────────────────────────────────────────────

/**
 * Joins clips with the concat demuxer and stream copy. All clips must share
 * codec, resolution and frame rate (renderKenBurnsSegment guarantees this).
 */
export async function concatenateClips(clipPaths: string[], outputPath: string): Promise<void> {
  if (clipPaths.length === 0) throw new Error('concatenateClips: no clips provided');
  logger.info('FFmpeg: concatenating clips', { count: clipPaths.length, outputPath });

  const listPath = path.join(path.dirname(outputPath), `concat_${Date.now()}.txt`);
  const listContent = clipPaths.map(p => `file '${p.replace(/'/g, "'\\''")}'`).join('\n');
  fs.writeFileSync(listPath, listContent, 'utf-8');

  try {
    await runFfmpeg(['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', outputPath], 'concatenateClips');
  } finally {
    fs.rmSync(listPath, { force: true });
  }
}

/** Lays a looping music bed under the video's own audio; video is copied. */
export async function mixAudioBed(
  videoPath: string, bedPath: string, bedVolumeDb: number, outputPath: string,
): Promise<void> {
  logger.info('FFmpeg: mixing audio bed', { bedVolumeDb, outputPath });
  await runFfmpeg([
    '-i', videoPath,
    '-stream_loop', '-1', '-i', bedPath,
    '-filter_complex',
    `[1:a]volume=${bedVolumeDb}dB[bed];[0:a][bed]amix=inputs=2:duration=first:dropout_transition=2[out]`,
    '-map', '0:v',
    '-map', '[out]',
    '-c:v', 'copy',
    '-c:a', 'aac',
    '-b:a', RENDER.audioBitrate,
    outputPath,
  ], 'mixAudioBed');
}

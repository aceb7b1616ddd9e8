/**
 * Episode workflow — the ordered stage list and the single runner that owns
 * claim, input checks, failure recording and hand-off to the next stage.
 *
 *   script ──(AUTO_ADVANCE_AFTER_SCRIPT)──▶ media ──▶ render ──(auto_post)──▶ publish
 */
import { PIPELINE } from '../config.js';
import type { EpisodeRecord } from '../db/episodes.js';
import { getSeriesById } from '../db/series.js';
import { enqueueTask } from '../queue/index.js';
import { errorMessage, PipelineInputError, StaleLeaseError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runRenderStage } from './assembler.js';
import { claimEpisode, type EpisodeLease, type PipelineStage } from './lifecycle.js';
import { runMediaStage } from './producer.js';
import { publishEpisode } from './publisher.js';
import { runScriptStage } from './scriptwriter.js';

export type StageTask = 'episode.script' | 'episode.media' | 'episode.render';

export interface StageDefinition {
  stage: PipelineStage;
  task: StageTask;
  /** `step` written into the episode error payload on failure. */
  errorStep: string;
  /** Keep earlier diagnostic fields when recording a failure. */
  mergeError: boolean;
  /** Episode fields that must be set before the stage body runs. */
  requires: ReadonlyArray<'script_id' | 'media_manifest'>;
  /** Whether success hands the episode to the next stage. */
  advance: () => boolean;
  run: (lease: EpisodeLease) => Promise<EpisodeRecord>;
}

export const EPISODE_WORKFLOW: readonly StageDefinition[] = [
  {
    stage:      'script',
    task:       'episode.script',
    errorStep:  'script_generation',
    mergeError: false,
    requires:   [],
    advance:    () => PIPELINE.autoAdvanceAfterScript,
    run:        runScriptStage,
  },
  {
    stage:      'media',
    task:       'episode.media',
    errorStep:  'media_generation',
    mergeError: false,
    requires:   ['script_id'],
    advance:    () => true,
    run:        runMediaStage,
  },
  {
    stage:      'render',
    task:       'episode.render',
    errorStep:  'render',
    mergeError: true,
    requires:   ['media_manifest'],
    advance:    () => true,
    run:        runRenderStage,
  },
];

const MISSING_INPUT: Record<StageDefinition['requires'][number], string> = {
  script_id:      'Episode has no script; run script generation first',
  media_manifest: 'No media assets; run media generation first',
};

function stageIndex(stage: PipelineStage): number {
  const index = EPISODE_WORKFLOW.findIndex(def => def.stage === stage);
  if (index < 0) throw new Error(`Unknown pipeline stage: ${stage}`);
  return index;
}

export function stageDefinition(stage: PipelineStage): StageDefinition {
  const def = EPISODE_WORKFLOW[stageIndex(stage)];
  if (!def) throw new Error(`Unknown pipeline stage: ${stage}`);
  return def;
}

export function nextStage(stage: PipelineStage): StageDefinition | null {
  return EPISODE_WORKFLOW[stageIndex(stage) + 1] ?? null;
}

// ── Runner ────────────────────────────────────────────────────────────────────

/**
 * Runs one stage for one episode under a fresh lease. On failure the episode
 * is marked `failed` and the error re-raised for the queue to retry. A lost
 * lease is re-raised without touching the episode.
 */
export async function runEpisodeStage(
  stage: PipelineStage,
  episodeId: string,
  taskId: string,
): Promise<EpisodeRecord> {
  const def = stageDefinition(stage);
  const lease = await claimEpisode(episodeId, stage, taskId);

  let episode: EpisodeRecord;
  try {
    for (const field of def.requires) {
      if (lease.episode[field] === null) throw new PipelineInputError(MISSING_INPUT[field]);
    }
    episode = await def.run(lease);
  } catch (err) {
    if (!(err instanceof StaleLeaseError)) await lease.fail(def.errorStep, err, { merge: def.mergeError });
    throw err;
  }

  await handOff(def, episode);
  return episode;
}

async function handOff(def: StageDefinition, episode: EpisodeRecord): Promise<void> {
  const next = nextStage(def.stage);
  if (next) {
    if (!def.advance()) {
      logger.info('Workflow: waiting for manual advance', { episodeId: episode.id, after: def.stage });
      return;
    }
    // The stage is committed; a retry of this task could no longer claim the episode.
    try {
      enqueueTask(next.task, { episodeId: episode.id });
    } catch (err) {
      logger.error('Workflow: hand-off failed — episode needs a manual advance', {
        episodeId: episode.id,
        after:     def.stage,
        next:      next.task,
        error:     errorMessage(err),
      });
    }
    return;
  }

  const series = await getSeriesById(episode.series_id);
  if (!series?.auto_post_enabled) return;
  // The video is already committed; a failed trigger leaves it for a manual publish.
  try {
    const posts = await publishEpisode(episode.id);
    logger.info('Workflow: auto-publish triggered', { episodeId: episode.id, posts: posts.length });
  } catch (err) {
    logger.error('Workflow: auto-publish failed', { episodeId: episode.id, error: errorMessage(err) });
  }
}

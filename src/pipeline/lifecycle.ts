/**
 * Episode lifecycle — the transition table and the per-episode stage lease.
 *
 *   scheduled → generating → ready_for_review → approved → posted
 *   generating / ready_for_review → failed;  failed → generating
 *
 * A stage claims an Episode by bumping `lease_version` (compare-and-swap) and
 * recording itself in `lease_stage` / `lease_task_id`. Every later write made
 * through the lease is conditional on that version, so a stale retry of the
 * same stage, or an older stage still running, cannot overwrite a newer run.
 */
import {
  getEpisodeById,
  updateEpisodeIfVersion,
  type EpisodePatch,
  type EpisodeRecord,
  type EpisodeStatus,
} from '../db/episodes.js';
import {
  errorMessage,
  IllegalTransitionError,
  PipelineInputError,
  StageNotClaimableError,
  StaleLeaseError,
  toErrorPayload,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type PipelineStage = 'script' | 'media' | 'render';

// ── Transitions ───────────────────────────────────────────────────────────────

export const EPISODE_TRANSITIONS: Record<EpisodeStatus, readonly EpisodeStatus[]> = {
  scheduled:        ['generating'],
  generating:       ['generating', 'ready_for_review', 'failed'],
  ready_for_review: ['generating', 'approved', 'failed'],
  approved:         ['posted'],
  posted:           [],
  failed:           ['generating'],
};

export function canTransition(from: EpisodeStatus, to: EpisodeStatus): boolean {
  return EPISODE_TRANSITIONS[from].includes(to);
}

/**
 * Whether `stage` may take the Episode as it stands. A task may always
 * re-take an Episode it already holds (redelivery after a crash).
 */
export function isClaimable(episode: EpisodeRecord, stage: PipelineStage, taskId: string): boolean {
  if (episode.status === 'generating' && episode.lease_stage === stage && episode.lease_task_id === taskId) {
    return true;
  }
  switch (stage) {
    case 'script':
      return episode.status === 'scheduled' || episode.status === 'failed';
    case 'media':
      return episode.status === 'ready_for_review' || episode.status === 'failed';
    case 'render':
      return (episode.status === 'generating' && episode.lease_stage === 'media')
        || (episode.status === 'failed' && episode.lease_stage === 'render');
  }
}

// ── Lease ─────────────────────────────────────────────────────────────────────

type LeasedPatch = Omit<EpisodePatch, 'lease_stage' | 'lease_task_id' | 'lease_version'>;

export class EpisodeLease {
  constructor(
    private current: EpisodeRecord,
    readonly stage: PipelineStage,
    readonly taskId: string,
  ) {}

  get episode(): EpisodeRecord {
    return this.current;
  }

  get version(): number {
    return this.current.lease_version;
  }

  /** Writes `patch` if this lease is still current; StaleLeaseError otherwise. */
  async commit(patch: LeasedPatch): Promise<EpisodeRecord> {
    if (patch.status && !canTransition(this.current.status, patch.status)) {
      throw new IllegalTransitionError(this.current.id, this.current.status, patch.status);
    }
    const next = await updateEpisodeIfVersion(this.current.id, this.version, patch);
    if (!next) throw new StaleLeaseError(this.current.id, this.stage);
    this.current = next;
    return next;
  }

  /**
   * Records a stage failure: status `failed` and a `{step, message}` payload,
   * merged over the existing one when `merge` is set. A lost lease is logged,
   * not thrown, so the caller can re-raise the original error.
   */
  async fail(step: string, err: unknown, options: { merge?: boolean } = {}): Promise<void> {
    const payload = toErrorPayload(step, err);
    const error = options.merge && this.current.error ? { ...this.current.error, ...payload } : payload;
    const next = await updateEpisodeIfVersion(this.current.id, this.version, { status: 'failed', error });
    if (!next) {
      logger.warn('Episode failure not recorded — lease lost', {
        episodeId: this.current.id,
        stage: this.stage,
        error: errorMessage(err),
      });
      return;
    }
    this.current = next;
    logger.error('Episode stage failed', { episodeId: next.id, stage: this.stage, step, error: payload.message });
  }
}

/**
 * Takes the Episode for `stage`: status → generating, lease version + 1.
 * The media stage also drops any manifest from an earlier run.
 */
export async function claimEpisode(
  episodeId: string,
  stage: PipelineStage,
  taskId: string,
): Promise<EpisodeLease> {
  const episode = await getEpisodeById(episodeId);
  if (!episode) throw new PipelineInputError(`Episode ${episodeId} not found`);
  if (!isClaimable(episode, stage, taskId)) {
    throw new StageNotClaimableError(episodeId, stage, episode.status);
  }

  const patch: EpisodePatch = {
    status:        'generating',
    lease_stage:   stage,
    lease_task_id: taskId,
    lease_version: episode.lease_version + 1,
  };
  if (stage === 'media') patch.media_manifest = null;

  const claimed = await updateEpisodeIfVersion(episodeId, episode.lease_version, patch);
  if (!claimed) throw new StaleLeaseError(episodeId, stage);

  logger.info('Episode claimed', {
    episodeId,
    stage,
    taskId,
    from: episode.status,
    leaseVersion: claimed.lease_version,
  });
  return new EpisodeLease(claimed, stage, taskId);
}

// ── Review ────────────────────────────────────────────────────────────────────

export async function approveEpisode(episodeId: string): Promise<EpisodeRecord> {
  const episode = await getEpisodeById(episodeId);
  if (!episode) throw new PipelineInputError(`Episode ${episodeId} not found`);
  if (!canTransition(episode.status, 'approved')) {
    throw new IllegalTransitionError(episodeId, episode.status, 'approved');
  }
  const approved = await updateEpisodeIfVersion(episodeId, episode.lease_version, { status: 'approved' });
  if (!approved) throw new StaleLeaseError(episodeId, 'approve');
  logger.info('Episode approved', { episodeId });
  return approved;
}

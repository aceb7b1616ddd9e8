/**
 * Series scheduling — launch, and the rolling top-up that keeps every active
 * Series a fortnight ahead. Each new Episode gets its script task queued
 * `SCRIPT_LEAD_HOURS` before its publish slot (or immediately when that is
 * already past).
 */
import { SCHEDULE } from '../config.js';
import { insertEpisode, listEpisodesForSeries, type EpisodeRecord } from '../db/episodes.js';
import { getSeriesById, listActiveSeries, updateSeries, type SeriesRecord } from '../db/series.js';
import { enqueueTask } from '../queue/index.js';
import { errorMessage, PipelineInputError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { estimateCreditsPerEpisode, estimateMonthlyCredits } from './credits.js';
import { localDate, nextPublishSlots, type RecurrenceRule } from './recurrence.js';

const LAUNCHABLE = new Set(['draft', 'paused']);

export function recurrenceRuleFor(series: SeriesRecord): RecurrenceRule {
  const schedule = series.schedule;
  return {
    frequency:        schedule?.frequency ?? 'daily',
    publishTimeOfDay: schedule?.publishTime ?? SCHEDULE.defaultTime,
    timezone:         schedule?.timezone ?? SCHEDULE.defaultTimezone,
    startDate:        schedule?.startDate ?? null,
    customWeekdays:   schedule?.customDays ?? null,
  };
}

// ── Top-up ────────────────────────────────────────────────────────────────────

/**
 * Creates Episodes for the next `count` publish slots, skipping local dates
 * (in the Series timezone) that already hold one, and queues their script
 * generation.
 */
export async function scheduleUpcomingEpisodes(
  seriesId: string,
  count: number = SCHEDULE.topUpBatch,
  now: Date = new Date(),
): Promise<EpisodeRecord[]> {
  const series = await getSeriesById(seriesId);
  if (!series) throw new PipelineInputError(`Series ${seriesId} not found`);

  const rule = recurrenceRuleFor(series);
  const dayOf = (instant: Date): string => localDate(instant, rule.timezone);
  const existing = await listEpisodesForSeries(seriesId);
  const usedDates = new Set(existing.flatMap(e => (e.scheduled_at ? [dayOf(new Date(e.scheduled_at))] : [])));
  let sequence = existing.reduce((max, e) => Math.max(max, e.sequence_number), 0);

  const created: EpisodeRecord[] = [];
  for (const slot of nextPublishSlots(rule, count, now)) {
    const day = dayOf(slot);
    if (usedDates.has(day)) continue;
    usedDates.add(day);

    sequence += 1;
    const episode = await insertEpisode({ series_id: seriesId, sequence_number: sequence, scheduled_at: slot.toISOString() });
    const runAt = new Date(slot.getTime() - SCHEDULE.scriptLeadMs);
    enqueueTask('episode.script', { episodeId: episode.id }, runAt > now ? { runAt } : {});
    created.push(episode);
  }

  logger.info('Schedule: episodes created', { seriesId, created: created.length, lastSequence: sequence });
  return created;
}

function wantsTopUp(series: SeriesRecord): boolean {
  return series.status === 'active' && series.schedule?.active !== false;
}

/** Series the hourly top-up should visit. */
export async function listSchedulableSeries(): Promise<SeriesRecord[]> {
  const series = await listActiveSeries();
  return series.filter(wantsTopUp);
}

/** Queue handler for `series.schedule`; a Series paused since enqueue is left alone. */
export async function runScheduleTask(seriesId: string, now: Date = new Date()): Promise<EpisodeRecord[]> {
  const series = await getSeriesById(seriesId);
  if (!series) throw new PipelineInputError(`Series ${seriesId} not found`);
  if (!wantsTopUp(series)) {
    logger.info('Schedule: series not active, skipping top-up', { seriesId, status: series.status });
    return [];
  }
  return scheduleUpcomingEpisodes(seriesId, SCHEDULE.topUpBatch, now);
}

/** One in-process top-up pass over every active Series. Returns Episodes created. */
export async function topUpActiveSeries(now: Date = new Date()): Promise<number> {
  let created = 0;
  for (const series of await listSchedulableSeries()) {
    try {
      created += (await scheduleUpcomingEpisodes(series.id, SCHEDULE.topUpBatch, now)).length;
    } catch (err) {
      // Retried on the next pass
      logger.error('Schedule: top-up failed', { seriesId: series.id, error: errorMessage(err) });
    }
  }
  return created;
}

// ── Launch ────────────────────────────────────────────────────────────────────

export interface LaunchResult {
  series: SeriesRecord;
  episodes: EpisodeRecord[];
  credits: { perEpisode: number; estimatedMonthly: number };
}

/**
 * Activates a draft or paused Series: schedules the first batch of Episodes,
 * records the credit estimate and turns auto-post on when accounts are
 * connected.
 */
export async function launchSeries(seriesId: string, options: { now?: Date } = {}): Promise<LaunchResult> {
  const series = await getSeriesById(seriesId);
  if (!series) throw new PipelineInputError(`Series ${seriesId} not found`);
  if (!LAUNCHABLE.has(series.status)) {
    throw new PipelineInputError(`Series cannot be launched from status "${series.status}"`);
  }
  if (!series.script_preferences) throw new PipelineInputError('Script preferences are required to launch');
  if (!series.voice_language) throw new PipelineInputError('Voice and language settings are required to launch');

  const perEpisode = estimateCreditsPerEpisode(series);
  const episodes = await scheduleUpcomingEpisodes(seriesId, SCHEDULE.launchBatch, options.now ?? new Date());

  const launched = await updateSeries(seriesId, {
    status:                      'active',
    auto_post_enabled:           (series.connected_social_account_ids ?? []).length > 0,
    estimated_credits_per_video: perEpisode,
  });

  logger.info('Series launched', { seriesId, episodes: episodes.length, perEpisode });
  return {
    series:   launched,
    episodes,
    credits:  { perEpisode, estimatedMonthly: estimateMonthlyCredits(perEpisode, series.schedule?.frequency) },
  };
}

/**
 * Per-episode credit estimate from series settings. Billing itself lives
 * elsewhere; the pipeline only records the estimate.
 */
import type { SeriesRecord } from '../db/series.js';

const BASE_CREDITS = 10;
const LONG_STORY_CREDITS = 5;
const PREMIUM_EFFECT_CREDITS = 5;

const ART_STYLE_CREDITS: Record<string, number> = {
  cinematic_ai: 8,
  anime:        8,
  realistic:    4,
  cartoon:      4,
  comic:        4,
};

type CreditInputs = Pick<SeriesRecord, 'script_preferences' | 'art_style' | 'visual_effects'>;

export function estimateCreditsPerEpisode(series: CreditInputs): number {
  let credits = BASE_CREDITS;
  if (series.script_preferences?.storyLength === '45_60') credits += LONG_STORY_CREDITS;
  credits += ART_STYLE_CREDITS[series.art_style?.style ?? ''] ?? 0;
  const premium = (series.visual_effects ?? []).filter(e => e.enabled && e.isPremium).length;
  credits += premium * PREMIUM_EFFECT_CREDITS;
  return Math.round(credits * 10) / 10;
}

/** Projection shown at launch: per-episode × 7 for daily series, × 12 otherwise. */
export function estimateMonthlyCredits(perEpisode: number, frequency: string | null | undefined): number {
  const episodes = frequency === 'daily' ? 7 : 12;
  return Math.round(perEpisode * episodes * 10) / 10;
}

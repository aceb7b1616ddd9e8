/**
 * Recurrence engine — turns a series schedule into concrete publish instants.
 *
 * Pure: the only clock is the injected `now`. Timezone arithmetic uses the
 * platform's Intl tz database, so a daily 09:00 slot stays at 09:00 local
 * across DST changes (the UTC gap becomes 23h or 25h on those days).
 */
import { SCHEDULE } from '../config.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface RecurrenceRule {
  /** `daily`, `weekly`, `custom`; anything else behaves as `daily`. */
  frequency: string;
  /** Local wall-clock time, `HH:MM`. */
  publishTimeOfDay: string;
  /** IANA zone name; unknown zones fall back to UTC. */
  timezone: string;
  /** ISO instant, or a bare `YYYY-MM-DD` meaning local midnight in `timezone`. */
  startDate?: string | Date | null;
  /** 0 = Monday … 6 = Sunday. Only read for `weekly` / `custom`. */
  customWeekdays?: readonly number[] | null;
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

// ── Timezone helpers ──────────────────────────────────────────────────────────

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timezone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timezone, fmt);
  }
  return fmt;
}

export function resolveTimezone(timezone: string | null | undefined): string {
  if (!timezone) return SCHEDULE.defaultTimezone;
  try {
    formatterFor(timezone);
    return timezone;
  } catch (err) {
    if (err instanceof RangeError) return SCHEDULE.defaultTimezone;
    throw err;
  }
}

function wallClock(instant: Date, timezone: string): WallClock {
  const parts = formatterFor(timezone).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find(p => p.type === type)?.value ?? '0');
  return {
    year:   get('year'),
    month:  get('month'),
    day:    get('day'),
    hour:   get('hour') % 24,
    minute: get('minute'),
    second: get('second'),
  };
}

/** Offset of `timezone` from UTC at `instant`, in ms (negative west of Greenwich). */
function offsetMs(instant: Date, timezone: string): number {
  const wc = wallClock(instant, timezone);
  const asUtc = Date.UTC(wc.year, wc.month - 1, wc.day, wc.hour, wc.minute, wc.second);
  const whole = Math.floor(instant.getTime() / 1000) * 1000;
  return asUtc - whole;
}

/**
 * Local wall-clock time → UTC instant. Two passes settle the offset on either
 * side of a transition.
 */
export function zonedTimeToUtc(
  year: number, month: number, day: number, hour: number, minute: number, timezone: string,
): Date {
  const asUtc = Date.UTC(year, month - 1, day, hour, minute);
  const guess = asUtc - offsetMs(new Date(asUtc), timezone);
  return new Date(asUtc - offsetMs(new Date(guess), timezone));
}

// ── Rule parsing ──────────────────────────────────────────────────────────────

export function parseTimeOfDay(value: string | null | undefined): { hour: number; minute: number } {
  const match = /^(\d{1,2}):(\d{2})/.exec((value ?? '').trim());
  if (match) {
    const hour = Number(match[1]);
    const minute = Number(match[2]);
    if (hour < 24 && minute < 60) return { hour, minute };
  }
  const [h = '9', m = '0'] = SCHEDULE.defaultTime.split(':');
  return { hour: Number(h), minute: Number(m) };
}

function parseStartDate(value: RecurrenceRule['startDate'], timezone: string): Date | null {
  if (!value) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  const dateOnly = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (dateOnly) {
    return zonedTimeToUtc(Number(dateOnly[1]), Number(dateOnly[2]), Number(dateOnly[3]), 0, 0, timezone);
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

function weekdayFilter(rule: RecurrenceRule): ReadonlySet<number> | null {
  if (rule.frequency !== 'weekly' && rule.frequency !== 'custom') return null;
  if (!rule.customWeekdays || rule.customWeekdays.length === 0) return null;
  return new Set(rule.customWeekdays);
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Next `count` publish instants (UTC, ascending) on or after `now`.
 * Returns fewer only when the search horizon runs out.
 */
export function nextPublishSlots(rule: RecurrenceRule, count: number, now: Date = new Date()): Date[] {
  if (count <= 0) return [];
  const timezone = resolveTimezone(rule.timezone);
  const { hour, minute } = parseTimeOfDay(rule.publishTimeOfDay);
  const start = parseStartDate(rule.startDate, timezone);
  const anchor = start && start.getTime() > now.getTime() ? start : now;
  const base = wallClock(anchor, timezone);
  const weekdays = weekdayFilter(rule);

  const slots: Date[] = [];
  for (let offset = 0; offset < SCHEDULE.horizonDays && slots.length < count; offset++) {
    // Calendar arithmetic in UTC on the local date's y/m/d rolls months and years correctly
    const day = new Date(Date.UTC(base.year, base.month - 1, base.day + offset));
    const weekday = (day.getUTCDay() + 6) % 7;
    if (weekdays && !weekdays.has(weekday)) continue;

    const candidate = zonedTimeToUtc(
      day.getUTCFullYear(), day.getUTCMonth() + 1, day.getUTCDate(), hour, minute, timezone,
    );
    if (candidate.getTime() < now.getTime()) continue;
    slots.push(candidate);
  }
  return slots;
}

/** Local `HH:MM` of an instant, for logs and tests. */
export function localTimeOfDay(instant: Date, timezone: string): string {
  const wc = wallClock(instant, resolveTimezone(timezone));
  return `${String(wc.hour).padStart(2, '0')}:${String(wc.minute).padStart(2, '0')}`;
}

/** Local `YYYY-MM-DD` of an instant. */
export function localDate(instant: Date, timezone: string): string {
  const wc = wallClock(instant, resolveTimezone(timezone));
  return `${wc.year}-${String(wc.month).padStart(2, '0')}-${String(wc.day).padStart(2, '0')}`;
}

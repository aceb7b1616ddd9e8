import {
  localDate,
  localTimeOfDay,
  nextPublishSlots,
  parseTimeOfDay,
  resolveTimezone,
  zonedTimeToUtc,
} from '../pipeline/recurrence.js';

const iso = (dates: Date[]) => dates.map(d => d.toISOString());

describe('nextPublishSlots', () => {
  it('keeps a daily slot at local wall-clock time across a DST change', () => {
    const slots = nextPublishSlots(
      { frequency: 'daily', publishTimeOfDay: '09:00', timezone: 'America/New_York' },
      4,
      new Date('2026-03-06T00:00:00Z'),
    );
    expect(iso(slots)).toEqual([
      '2026-03-06T14:00:00.000Z',
      '2026-03-07T14:00:00.000Z',
      '2026-03-08T13:00:00.000Z',
      '2026-03-09T13:00:00.000Z',
    ]);
  });

  it('accepts a candidate equal to now', () => {
    const slots = nextPublishSlots(
      { frequency: 'daily', publishTimeOfDay: '09:00', timezone: 'UTC' },
      1,
      new Date('2026-03-06T09:00:00Z'),
    );
    expect(iso(slots)).toEqual(['2026-03-06T09:00:00.000Z']);
  });

  it('skips today once the time of day has passed', () => {
    const slots = nextPublishSlots(
      { frequency: 'daily', publishTimeOfDay: '09:00', timezone: 'UTC' },
      1,
      new Date('2026-03-06T09:00:01Z'),
    );
    expect(iso(slots)).toEqual(['2026-03-07T09:00:00.000Z']);
  });

  it('filters weekly schedules by weekday, 0 = Monday', () => {
    // 2026-03-04 is a Wednesday
    const slots = nextPublishSlots(
      { frequency: 'weekly', publishTimeOfDay: '09:00', timezone: 'UTC', customWeekdays: [0, 4] },
      3,
      new Date('2026-03-04T12:00:00Z'),
    );
    expect(iso(slots)).toEqual([
      '2026-03-06T09:00:00.000Z',
      '2026-03-09T09:00:00.000Z',
      '2026-03-13T09:00:00.000Z',
    ]);
  });

  it('treats an empty weekday set as daily', () => {
    const slots = nextPublishSlots(
      { frequency: 'custom', publishTimeOfDay: '18:30', timezone: 'UTC', customWeekdays: [] },
      2,
      new Date('2026-03-04T12:00:00Z'),
    );
    expect(iso(slots)).toEqual(['2026-03-04T18:30:00.000Z', '2026-03-05T18:30:00.000Z']);
  });

  it('treats unknown frequencies as daily and ignores their weekdays', () => {
    const slots = nextPublishSlots(
      { frequency: 'monthly', publishTimeOfDay: '09:00', timezone: 'UTC', customWeekdays: [0] },
      2,
      new Date('2026-03-04T12:00:00Z'),
    );
    expect(iso(slots)).toEqual(['2026-03-05T09:00:00.000Z', '2026-03-06T09:00:00.000Z']);
  });

  it('anchors at a future start date in the target timezone', () => {
    const slots = nextPublishSlots(
      { frequency: 'daily', publishTimeOfDay: '09:00', timezone: 'Asia/Tokyo', startDate: '2026-04-01' },
      2,
      new Date('2026-03-01T00:00:00Z'),
    );
    expect(iso(slots)).toEqual(['2026-04-01T00:00:00.000Z', '2026-04-02T00:00:00.000Z']);
  });

  it('ignores a start date in the past', () => {
    const slots = nextPublishSlots(
      { frequency: 'daily', publishTimeOfDay: '09:00', timezone: 'UTC', startDate: '2025-01-01' },
      1,
      new Date('2026-03-06T10:00:00Z'),
    );
    expect(iso(slots)).toEqual(['2026-03-07T09:00:00.000Z']);
  });

  it('returns fewer slots when the search horizon runs out', () => {
    const slots = nextPublishSlots(
      { frequency: 'weekly', publishTimeOfDay: '09:00', timezone: 'UTC', customWeekdays: [9] },
      3,
      new Date('2026-03-04T12:00:00Z'),
    );
    expect(slots).toEqual([]);
  });

  it('returns nothing for a non-positive count', () => {
    expect(nextPublishSlots({ frequency: 'daily', publishTimeOfDay: '09:00', timezone: 'UTC' }, 0)).toEqual([]);
  });

  it('rolls over month and year boundaries', () => {
    const slots = nextPublishSlots(
      { frequency: 'daily', publishTimeOfDay: '23:00', timezone: 'UTC' },
      2,
      new Date('2026-12-31T23:30:00Z'),
    );
    expect(iso(slots)).toEqual(['2027-01-01T23:00:00.000Z', '2027-01-02T23:00:00.000Z']);
  });
});

describe('timezone helpers', () => {
  it('falls back to UTC for unknown or empty zones', () => {
    expect(resolveTimezone('Mars/Olympus_Mons')).toBe('UTC');
    expect(resolveTimezone(null)).toBe('UTC');
    expect(resolveTimezone('Europe/Berlin')).toBe('Europe/Berlin');
  });

  it('converts local wall-clock time to UTC', () => {
    expect(zonedTimeToUtc(2026, 7, 1, 9, 0, 'Europe/Berlin').toISOString()).toBe('2026-07-01T07:00:00.000Z');
    expect(zonedTimeToUtc(2026, 1, 15, 9, 0, 'Europe/Berlin').toISOString()).toBe('2026-01-15T08:00:00.000Z');
  });

  it('parses HH:MM and falls back to 09:00', () => {
    expect(parseTimeOfDay('7:05')).toEqual({ hour: 7, minute: 5 });
    expect(parseTimeOfDay('25:00')).toEqual({ hour: 9, minute: 0 });
    expect(parseTimeOfDay(undefined)).toEqual({ hour: 9, minute: 0 });
  });

  it('formats an instant as local HH:MM', () => {
    expect(localTimeOfDay(new Date('2026-03-09T13:00:00Z'), 'America/New_York')).toBe('09:00');
  });

  it('gives the local calendar date, which can differ from the UTC one', () => {
    expect(localDate(new Date('2026-03-08T00:30:00Z'), 'America/New_York')).toBe('2026-03-07');
    expect(localDate(new Date('2026-03-08T23:30:00Z'), 'America/New_York')).toBe('2026-03-08');
    expect(localDate(new Date('2026-03-08T23:30:00Z'), 'Not/AZone')).toBe('2026-03-08');
  });
});

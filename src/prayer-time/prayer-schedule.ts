import { format, set, startOfDay } from 'date-fns';

import { PRAYER_NAMES, PrayerName, prayerLabel } from '../common/types/prayer-name';

import { PrayerTimeFetchError } from './prayer-time-fetch.error';

/**
 * Prayer name → time of day ("HH:mm").
 */
export type PrayerTimes = Record<PrayerName, string>;

export interface PrayerTimeEntry {
  readonly name: PrayerName;
  /** Normalized "HH:mm" */
  readonly time: string;
  /** The moment on the schedule's date, in epoch milliseconds */
  readonly atMs: number;
  /** Same moment as a new Date on every read */
  readonly at: Date;
}

function createEntry(name: PrayerName, time: string, atMs: number): PrayerTimeEntry {
  return Object.freeze({
    name,
    time,
    atMs,
    get at() {
      return new Date(atMs);
    },
  });
}

/**
 * The five prayer times of one calendar day, in prayer order.
 * Built once per day and frozen.
 */
export interface PrayerSchedule {
  /** yyyy-MM-dd */
  readonly date: string;
  readonly source: string;
  readonly times: Readonly<PrayerTimes>;
  readonly entries: readonly PrayerTimeEntry[];
}

/**
 * Read the leading "H:mm" / "HH:mm" of a time string.
 * Suffixes such as " (CEST)" are ignored.
 */
export function parseTimeOfDay(raw: string): { hours: number; minutes: number } | null {
  const match = raw.trim().match(/^(\d{1,2}):(\d{2})(?!\d)/);
  if (!match) return null;

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours > 23 || minutes > 59) return null;

  return { hours, minutes };
}

/**
 * Build a schedule for `date` from raw time strings.
 * Throws PrayerTimeFetchError when a time is missing or malformed, or when
 * the times go backwards.
 */
export function buildPrayerSchedule(
  date: Date,
  rawTimes: Partial<Record<PrayerName, string>>,
  source: string,
): PrayerSchedule {
  const day = startOfDay(date);
  const entries: PrayerTimeEntry[] = [];

  for (const name of PRAYER_NAMES) {
    const raw = rawTimes[name];
    const parsed = raw === undefined ? null : parseTimeOfDay(raw);

    if (!parsed) {
      throw new PrayerTimeFetchError(
        raw === undefined ? `Missing time for ${name}` : `Malformed time for ${name}: "${raw}"`,
      );
    }

    const at = set(day, { hours: parsed.hours, minutes: parsed.minutes, seconds: 0, milliseconds: 0 });
    const previous = entries[entries.length - 1];

    if (previous && at.getTime() < previous.atMs) {
      throw new PrayerTimeFetchError(
        `Prayer times out of order: ${name} (${format(at, 'HH:mm')}) is before ${previous.name} (${previous.time})`,
      );
    }

    entries.push(createEntry(name, format(at, 'HH:mm'), at.getTime()));
  }

  const [fajr, dhuhr, asr, maghrib, isha] = entries;

  return Object.freeze({
    date: format(day, 'yyyy-MM-dd'),
    source,
    times: Object.freeze({
      fajr: fajr.time,
      dhuhr: dhuhr.time,
      asr: asr.time,
      maghrib: maghrib.time,
      isha: isha.time,
    }),
    entries: Object.freeze(entries),
  });
}

/**
 * Prayers whose time is the latest one already reached at `now`.
 * Usually one entry; several when prayers share a time. Empty before fajr.
 */
export function currentPrayers(schedule: PrayerSchedule, now: Date): PrayerTimeEntry[] {
  const reached = schedule.entries.filter((entry) => entry.atMs <= now.getTime());
  const latest = reached[reached.length - 1];

  if (!latest) return [];

  return reached.filter((entry) => entry.atMs === latest.atMs);
}

/**
 * Prayers whose time falls in (after, upTo], in prayer order.
 */
export function prayersBetween(
  schedule: PrayerSchedule,
  after: Date,
  upTo: Date,
): PrayerTimeEntry[] {
  return schedule.entries.filter(
    (entry) => entry.atMs > after.getTime() && entry.atMs <= upTo.getTime(),
  );
}

/**
 * First prayer strictly after `now`, or null once isha has passed.
 */
export function nextPrayer(schedule: PrayerSchedule, now: Date): PrayerTimeEntry | null {
  return schedule.entries.find((entry) => entry.atMs > now.getTime()) ?? null;
}

/**
 * "Fajr: 06:00, Dhuhr: 13:00, ..." for log lines.
 */
export function describeSchedule(schedule: PrayerSchedule): string {
  return schedule.entries.map((entry) => `${prayerLabel(entry.name)}: ${entry.time}`).join(', ');
}

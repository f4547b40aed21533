/**
 * The five daily prayers, in the order they occur during a day.
 * Schedules, configuration and cache records are all keyed by these names.
 */
export const PRAYER_NAMES = ['fajr', 'dhuhr', 'asr', 'maghrib', 'isha'] as const;

export type PrayerName = (typeof PRAYER_NAMES)[number];

export function isPrayerName(value: string): value is PrayerName {
  return PRAYER_NAMES.some((name) => name === value);
}

/**
 * Display label ("Fajr", "Dhuhr", ...).
 */
export function prayerLabel(name: PrayerName): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}

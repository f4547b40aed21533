import { PrayerLocation } from '../../config/ezan-config.schema';
import { PrayerSchedule } from '../prayer-schedule';

/**
 * A source of daily prayer times.
 * Implementations reject with PrayerTimeFetchError; they never cache.
 */
export interface IPrayerTimeSource {
  /** Short identifier recorded in the daily cache ("aladhan", "local") */
  readonly name: string;

  fetch(date: Date, location: PrayerLocation): Promise<PrayerSchedule>;
}

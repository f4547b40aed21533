import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { format } from 'date-fns';

import { PrayerLocation } from '../config/ezan-config.schema';
import { DailyCacheService } from '../persistence/daily-cache.service';

import { IPrayerTimeSource } from './interfaces';
import { buildPrayerSchedule, describeSchedule, PrayerSchedule } from './prayer-schedule';
import { PRAYER_TIME_SOURCE } from './prayer-time.constants';

/**
 * Service for obtaining the day's prayer times.
 * Reads the daily cache first and only asks the configured source once per day.
 */
@Injectable()
export class PrayerTimeService {
  private readonly logger = new Logger(PrayerTimeService.name);
  private readonly location: PrayerLocation;

  constructor(
    @Inject(PRAYER_TIME_SOURCE) private readonly source: IPrayerTimeSource,
    private readonly dailyCache: DailyCacheService,
    private readonly configService: ConfigService,
  ) {
    this.location = this.configService.getOrThrow<PrayerLocation>('ezan.location');
  }

  /**
   * "City, Country" label of the configured location.
   */
  get locationLabel(): string {
    return `${this.location.city}, ${this.location.country}`;
  }

  /**
   * Get the schedule for a date, from the cache when it was already fetched
   * for the configured location. Rejects with PrayerTimeFetchError when the
   * source fails.
   */
  async getSchedule(date: Date = new Date()): Promise<PrayerSchedule> {
    const cached = await this.readCached(date);
    if (cached) {
      return cached;
    }

    const schedule = await this.source.fetch(date, this.location);
    this.logger.log(
      `Prayer times for ${schedule.date} (${this.locationLabel}, ${schedule.source}): ${describeSchedule(schedule)}`,
    );

    try {
      await this.dailyCache.saveSchedule(schedule, this.locationLabel);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to cache prayer times for ${schedule.date}: ${message}`);
    }

    return schedule;
  }

  /**
   * Fetch from the source, bypassing and leaving the cache untouched.
   */
  async fetchFresh(date: Date = new Date()): Promise<PrayerSchedule> {
    return this.source.fetch(date, this.location);
  }

  private async readCached(date: Date): Promise<PrayerSchedule | null> {
    const dateStr = format(date, 'yyyy-MM-dd');

    try {
      const record = await this.dailyCache.load(dateStr);

      if (!record) return null;

      if (record.location !== this.locationLabel) {
        this.logger.log(
          `Cached times for ${dateStr} are for ${record.location}; fetching for ${this.locationLabel}`,
        );
        return null;
      }

      this.logger.debug(`Using cached prayer times for ${dateStr}`);
      return buildPrayerSchedule(date, record.times, record.source);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Ignoring prayer times cache for ${dateStr}: ${message}`);
      return null;
    }
  }
}

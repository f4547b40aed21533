import * as path from 'path';

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { PrayerName } from '../common/types/prayer-name';
import { TriggerOutcome } from '../common/types/trigger-outcome';
import { atomicWriteJson, readJsonFile } from '../common/utils/json-file';
import { PrayerSchedule } from '../prayer-time/prayer-schedule';

import { ConsumedEntry, DailyCacheRecord, validateDailyCacheRecord } from './daily-cache.schema';

/**
 * Per-day cache of fetched prayer times and of the prayers already triggered.
 * Each day has its own JSON file in data/cache/YYYY-MM-DD.json, so a restart
 * neither refetches the times nor replays a trigger.
 */
@Injectable()
export class DailyCacheService {
  private readonly logger = new Logger(DailyCacheService.name);
  private readonly cacheDir: string;

  constructor(private readonly configService: ConfigService) {
    this.cacheDir = this.configService.get<string>('paths.cache', './data/cache');
  }

  /**
   * Get the file path for a given date.
   */
  getFilePath(date: string): string {
    return path.join(path.resolve(this.cacheDir), `${date}.json`);
  }

  /**
   * Load the record for a date.
   * Returns null if none was written; throws if the file is invalid.
   */
  async load(date: string): Promise<DailyCacheRecord | null> {
    const data = await readJsonFile(this.getFilePath(date));
    if (data === null) return null;

    return validateDailyCacheRecord(data, date);
  }

  /**
   * Store a freshly fetched schedule. Triggers already recorded for the day are kept.
   */
  async saveSchedule(schedule: PrayerSchedule, location: string): Promise<DailyCacheRecord> {
    const existing = await this.loadQuietly(schedule.date);

    const record: DailyCacheRecord = {
      date: schedule.date,
      location,
      source: schedule.source,
      fetchedAt: new Date().toISOString(),
      times: { ...schedule.times },
      consumed: existing?.consumed ?? [],
    };

    await atomicWriteJson(this.getFilePath(schedule.date), record);
    this.logger.debug(`Cached prayer times for ${schedule.date}`);
    return record;
  }

  /**
   * Record that a prayer was triggered. Requires the day's schedule to be cached.
   */
  async markConsumed(
    date: string,
    prayer: PrayerName,
    outcome: TriggerOutcome,
    at: Date = new Date(),
  ): Promise<void> {
    const record = await this.load(date);

    if (!record) {
      this.logger.warn(`No cached schedule for ${date}; ${prayer} not recorded`);
      return;
    }

    const entry: ConsumedEntry = { prayer, at: at.toISOString(), outcome };
    record.consumed = [...record.consumed.filter((c) => c.prayer !== prayer), entry];

    await atomicWriteJson(this.getFilePath(date), record);
  }

  /**
   * Prayers already triggered on a date. Empty when nothing is cached or the file is unreadable.
   */
  async getConsumed(date: string): Promise<ConsumedEntry[]> {
    const record = await this.loadQuietly(date);
    return record?.consumed ?? [];
  }

  private async loadQuietly(date: string): Promise<DailyCacheRecord | null> {
    try {
      return await this.load(date);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Ignoring unreadable cache for ${date}: ${message}`);
      return null;
    }
  }
}

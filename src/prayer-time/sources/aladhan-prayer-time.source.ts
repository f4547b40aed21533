import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { format } from 'date-fns';
import { z } from 'zod';

import { PrayerLocation } from '../../config/ezan-config.schema';
import { IPrayerTimeSource } from '../interfaces';
import { buildPrayerSchedule, PrayerSchedule } from '../prayer-schedule';
import { PrayerTimeFetchError } from '../prayer-time-fetch.error';
import { ALADHAN_BASE_URL, USER_AGENT } from '../prayer-time.constants';

/**
 * The part of the Aladhan `timingsByCity` response we rely on.
 * Timings may carry a timezone suffix ("05:59 (CEST)").
 */
const aladhanResponseSchema = z.object({
  code: z.number(),
  status: z.string().optional(),
  data: z.object({
    timings: z.object({
      Fajr: z.string(),
      Dhuhr: z.string(),
      Asr: z.string(),
      Maghrib: z.string(),
      Isha: z.string(),
    }),
  }),
});

/**
 * Fetches prayer times for a city from the Aladhan API.
 * Method 13 follows the Diyanet İşleri Başkanlığı calculation.
 */
@Injectable()
export class AladhanPrayerTimeSource implements IPrayerTimeSource {
  readonly name = 'aladhan';

  private readonly logger = new Logger(AladhanPrayerTimeSource.name);
  private readonly method: number;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.method = this.configService.get<number>('ezan.source.method', 13);
    this.timeoutMs = this.configService.get<number>('ezan.source.timeoutSeconds', 10) * 1000;
  }

  async fetch(date: Date, location: PrayerLocation): Promise<PrayerSchedule> {
    const url = this.buildUrl(date, location);
    this.logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PrayerTimeFetchError(`Network error fetching prayer times: ${message}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new PrayerTimeFetchError(`Prayer times request failed with HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new PrayerTimeFetchError('Prayer times response is not valid JSON', { cause: error });
    }

    const result = aladhanResponseSchema.safeParse(body);
    if (!result.success) {
      const fields = result.error.errors.map((e) => e.path.join('.')).join(', ');
      throw new PrayerTimeFetchError(`Unexpected prayer times response (${fields})`);
    }

    if (result.data.code !== 200) {
      throw new PrayerTimeFetchError(
        `Prayer times API returned code ${result.data.code}${result.data.status ? ` (${result.data.status})` : ''}`,
      );
    }

    const { timings } = result.data.data;

    return buildPrayerSchedule(
      date,
      {
        fajr: timings.Fajr,
        dhuhr: timings.Dhuhr,
        asr: timings.Asr,
        maghrib: timings.Maghrib,
        isha: timings.Isha,
      },
      this.name,
    );
  }

  buildUrl(date: Date, location: PrayerLocation): string {
    const params = new URLSearchParams({
      city: location.city,
      country: location.country,
      method: String(this.method),
    });

    return `${ALADHAN_BASE_URL}/timingsByCity/${format(date, 'dd-MM-yyyy')}?${params.toString()}`;
  }
}

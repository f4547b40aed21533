import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CalculationMethod, CalculationParameters, Coordinates, PrayerTimes } from 'adhan';
import { format } from 'date-fns';

import { PrayerLocation } from '../../config/ezan-config.schema';
import { IPrayerTimeSource } from '../interfaces';
import { buildPrayerSchedule, PrayerSchedule } from '../prayer-schedule';
import { PrayerTimeFetchError } from '../prayer-time-fetch.error';

/**
 * Calculates prayer times offline with the adhan library.
 * Needs the location's latitude and longitude.
 */
@Injectable()
export class LocalPrayerTimeSource implements IPrayerTimeSource {
  readonly name = 'local';

  private readonly calcParams: CalculationParameters;

  constructor(private readonly configService: ConfigService) {
    const method = this.configService.get<string>('ezan.source.calcMethod', 'turkey');
    this.calcParams = getCalculationParams(method);
  }

  async fetch(date: Date, location: PrayerLocation): Promise<PrayerSchedule> {
    if (location.latitude === undefined || location.longitude === undefined) {
      throw new PrayerTimeFetchError(
        `Local calculation needs latitude and longitude for ${location.city}`,
      );
    }

    const coordinates = new Coordinates(location.latitude, location.longitude);
    const times = new PrayerTimes(coordinates, date, this.calcParams);

    return buildPrayerSchedule(
      date,
      {
        fajr: format(times.fajr, 'HH:mm'),
        dhuhr: format(times.dhuhr, 'HH:mm'),
        asr: format(times.asr, 'HH:mm'),
        maghrib: format(times.maghrib, 'HH:mm'),
        isha: format(times.isha, 'HH:mm'),
      },
      this.name,
    );
  }
}

/**
 * Get calculation parameters based on method name.
 * Unknown names fall back to the Diyanet (Turkey) method.
 */
export function getCalculationParams(method: string): CalculationParameters {
  const methodMap: Record<string, () => CalculationParameters> = {
    turkey: () => CalculationMethod.Turkey(),
    egyptian: () => CalculationMethod.Egyptian(),
    muslim_world_league: () => CalculationMethod.MuslimWorldLeague(),
    isna: () => CalculationMethod.NorthAmerica(),
    umm_al_qura: () => CalculationMethod.UmmAlQura(),
    karachi: () => CalculationMethod.Karachi(),
    moonsighting_committee: () => CalculationMethod.MoonsightingCommittee(),
    dubai: () => CalculationMethod.Dubai(),
    qatar: () => CalculationMethod.Qatar(),
    kuwait: () => CalculationMethod.Kuwait(),
    singapore: () => CalculationMethod.Singapore(),
    tehran: () => CalculationMethod.Tehran(),
  };

  const factory = methodMap[method.toLowerCase()] ?? methodMap.turkey;
  return factory();
}

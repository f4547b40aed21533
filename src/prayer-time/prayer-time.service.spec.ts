import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { DailyCacheRecord } from '../persistence/daily-cache.schema';
import { DailyCacheService } from '../persistence/daily-cache.service';

import { IPrayerTimeSource } from './interfaces';
import { buildPrayerSchedule } from './prayer-schedule';
import { PrayerTimeFetchError } from './prayer-time-fetch.error';
import { PRAYER_TIME_SOURCE } from './prayer-time.constants';
import { PrayerTimeService } from './prayer-time.service';

describe('PrayerTimeService', () => {
  let service: PrayerTimeService;
  let source: { name: string; fetch: jest.MockedFunction<IPrayerTimeSource['fetch']> };
  let dailyCache: {
    load: jest.MockedFunction<DailyCacheService['load']>;
    saveSchedule: jest.MockedFunction<DailyCacheService['saveSchedule']>;
  };

  const date = new Date('2025-03-17T09:00:00');
  const times = { fajr: '06:00', dhuhr: '13:00', asr: '16:30', maghrib: '19:45', isha: '21:15' };
  const fetched = buildPrayerSchedule(date, times, 'aladhan');

  const cachedRecord = (location: string): DailyCacheRecord => ({
    date: '2025-03-17',
    location,
    source: 'aladhan',
    fetchedAt: '2025-03-17T00:00:30.000Z',
    times: { ...times, fajr: '05:58' },
    consumed: [],
  });

  const mockConfigService = {
    getOrThrow: jest.fn((key: string) => {
      if (key === 'ezan.location') return { city: 'Barcelona', country: 'Spain' };
      throw new Error(`Unexpected config key ${key}`);
    }),
  };

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    source = { name: 'aladhan', fetch: jest.fn().mockResolvedValue(fetched) };
    dailyCache = {
      load: jest.fn().mockResolvedValue(null),
      saveSchedule: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PrayerTimeService,
        { provide: PRAYER_TIME_SOURCE, useValue: source },
        { provide: DailyCacheService, useValue: dailyCache },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<PrayerTimeService>(PrayerTimeService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getSchedule', () => {
    it('should fetch and cache when nothing is cached', async () => {
      const schedule = await service.getSchedule(date);

      expect(schedule).toBe(fetched);
      expect(source.fetch).toHaveBeenCalledWith(date, { city: 'Barcelona', country: 'Spain' });
      expect(dailyCache.load).toHaveBeenCalledWith('2025-03-17');
      expect(dailyCache.saveSchedule).toHaveBeenCalledWith(fetched, 'Barcelona, Spain');
    });

    it('should use the cached times without fetching', async () => {
      dailyCache.load.mockResolvedValue(cachedRecord('Barcelona, Spain'));

      const schedule = await service.getSchedule(date);

      expect(source.fetch).not.toHaveBeenCalled();
      expect(schedule.times.fajr).toBe('05:58');
      expect(schedule.date).toBe('2025-03-17');
    });

    it('should refetch when the cache is for another location', async () => {
      dailyCache.load.mockResolvedValue(cachedRecord('Istanbul, Turkey'));

      const schedule = await service.getSchedule(date);

      expect(source.fetch).toHaveBeenCalledTimes(1);
      expect(schedule.times.fajr).toBe('06:00');
    });

    it('should refetch when the cache is unreadable', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      dailyCache.load.mockRejectedValue(new Error('Invalid daily cache for 2025-03-17'));

      await service.getSchedule(date);

      expect(source.fetch).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        'Ignoring prayer times cache for 2025-03-17: Invalid daily cache for 2025-03-17',
      );
    });

    it('should still return the schedule when caching fails', async () => {
      const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      dailyCache.saveSchedule.mockRejectedValue(new Error('EACCES'));

      const schedule = await service.getSchedule(date);

      expect(schedule).toBe(fetched);
      expect(error).toHaveBeenCalledWith('Failed to cache prayer times for 2025-03-17: EACCES');
    });

    it('should propagate fetch errors', async () => {
      source.fetch.mockRejectedValue(new PrayerTimeFetchError('offline'));

      await expect(service.getSchedule(date)).rejects.toThrow(PrayerTimeFetchError);
      expect(dailyCache.saveSchedule).not.toHaveBeenCalled();
    });
  });

  describe('fetchFresh', () => {
    it('should bypass the cache entirely', async () => {
      dailyCache.load.mockResolvedValue(cachedRecord('Barcelona, Spain'));

      const schedule = await service.fetchFresh(date);

      expect(schedule).toBe(fetched);
      expect(dailyCache.load).not.toHaveBeenCalled();
      expect(dailyCache.saveSchedule).not.toHaveBeenCalled();
    });
  });

  describe('locationLabel', () => {
    it('should combine city and country', () => {
      expect(service.locationLabel).toBe('Barcelona, Spain');
    });
  });
});

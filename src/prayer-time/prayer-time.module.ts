import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { PrayerSource } from '../config/ezan-config.schema';
import { PersistenceModule } from '../persistence/persistence.module';

import { PRAYER_TIME_SOURCE } from './prayer-time.constants';
import { PrayerTimeService } from './prayer-time.service';
import { AladhanPrayerTimeSource, LocalPrayerTimeSource } from './sources';

/**
 * Prayer Time Module
 *
 * Provides the day's prayer times for the configured location, fetched from
 * the Aladhan API or calculated locally with the adhan library.
 */
@Module({
  imports: [PersistenceModule],
  providers: [
    AladhanPrayerTimeSource,
    LocalPrayerTimeSource,

    // The abstraction token → configured source
    {
      provide: PRAYER_TIME_SOURCE,
      useFactory: (
        configService: ConfigService,
        aladhan: AladhanPrayerTimeSource,
        local: LocalPrayerTimeSource,
      ) => {
        const provider = configService.get<PrayerSource>('ezan.source.provider', 'aladhan');
        return provider === 'local' ? local : aladhan;
      },
      inject: [ConfigService, AladhanPrayerTimeSource, LocalPrayerTimeSource],
    },
    PrayerTimeService,
  ],
  exports: [PrayerTimeService],
})
export class PrayerTimeModule {}

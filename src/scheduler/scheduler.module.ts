import { Module } from '@nestjs/common';

import { PersistenceModule } from '../persistence/persistence.module';
import { PrayerTimeModule } from '../prayer-time/prayer-time.module';
import { TriggerModule } from '../trigger/trigger.module';

import { SchedulerService } from './scheduler.service';

/**
 * Scheduler Module
 *
 * Runs the polling loop. Requires ScheduleModule.forRoot() in the root module.
 */
@Module({
  imports: [PrayerTimeModule, PersistenceModule, TriggerModule],
  providers: [SchedulerService],
  exports: [SchedulerService],
})
export class SchedulerModule {}

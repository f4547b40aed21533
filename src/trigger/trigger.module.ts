import { Module } from '@nestjs/common';

import { PlatformModule } from '../platform/platform.module';

import { TriggerService } from './trigger.service';

/**
 * Trigger Module
 *
 * Wakes the machine and opens the configured ezan video for a prayer.
 */
@Module({
  imports: [PlatformModule],
  providers: [TriggerService],
  exports: [TriggerService],
})
export class TriggerModule {}

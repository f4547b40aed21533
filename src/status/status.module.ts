import { Module } from '@nestjs/common';

import { PlatformModule } from '../platform/platform.module';
import { PrayerTimeModule } from '../prayer-time/prayer-time.module';

import { StatusService } from './status.service';

/**
 * Status Module
 *
 * Builds the report printed by the status command.
 */
@Module({
  imports: [PlatformModule, PrayerTimeModule],
  providers: [StatusService],
  exports: [StatusService],
})
export class StatusModule {}

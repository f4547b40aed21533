import { Module } from '@nestjs/common';

import { DailyCacheService } from './daily-cache.service';

/**
 * Persistence Module
 *
 * Reads and writes the daily cache files (prayer times and triggered prayers).
 */
@Module({
  imports: [],
  providers: [DailyCacheService],
  exports: [DailyCacheService],
})
export class PersistenceModule {}

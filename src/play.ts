import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { isPrayerName, PRAYER_NAMES } from './common/types/prayer-name';
import { validateEnv } from './config/configuration';
import { AppLogger } from './logging/app-logger';
import { PlayAppModule } from './trigger/play-app.module';
import { TriggerService } from './trigger/trigger.service';

/**
 * Manual trigger: npm run play -- <prayer>
 */
async function play(): Promise<void> {
  const [prayer] = process.argv.slice(2);

  if (prayer === undefined || !isPrayerName(prayer)) {
    throw new Error(`Usage: npm run play -- <${PRAYER_NAMES.join('|')}>`);
  }

  const env = validateEnv();
  const app = await NestFactory.createApplicationContext(PlayAppModule, {
    logger: new AppLogger({ level: env.LOG_LEVEL, logFile: env.LOG_FILE }),
    abortOnError: false,
  });

  try {
    const outcome = await app.get(TriggerService).fire(prayer);
    if (outcome !== 'played') {
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

play().catch((error: unknown) => {
  new Logger('Play').error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

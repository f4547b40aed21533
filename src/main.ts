import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { validateEnv } from './config/configuration';
import { AppLogger } from './logging/app-logger';

async function bootstrap(): Promise<void> {
  const env = validateEnv();

  // Shown by ps; the status command looks for it
  process.title = 'ezan-player';

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: new AppLogger({ level: env.LOG_LEVEL, logFile: env.LOG_FILE }),
    abortOnError: false,
  });

  app.enableShutdownHooks();
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  if (error instanceof Error) {
    logger.error(`Failed to start: ${error.message}`, error.stack);
  } else {
    logger.error(`Failed to start: ${String(error)}`);
  }
  process.exit(1);
});

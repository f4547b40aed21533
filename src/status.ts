import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { validateEnv } from './config/configuration';
import { StatusAppModule } from './status/status-app.module';
import { StatusService } from './status/status.service';

async function status(): Promise<void> {
  validateEnv();

  const app = await NestFactory.createApplicationContext(StatusAppModule, {
    logger: ['error', 'warn'],
    abortOnError: false,
  });

  try {
    const statusService = app.get(StatusService);
    const report = await statusService.collect();
    process.stdout.write(`${statusService.render(report)}\n`);
  } finally {
    await app.close();
  }
}

status().catch((error: unknown) => {
  new Logger('Status').error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

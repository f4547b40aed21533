import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { readOnlyConfiguration } from '../config/configuration';

import { StatusModule } from './status.module';

/**
 * Root module of the status command. No scheduler: the command reports and exits.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [readOnlyConfiguration],
    }),
    StatusModule,
  ],
})
export class StatusAppModule {}

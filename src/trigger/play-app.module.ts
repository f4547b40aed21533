import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import configuration from '../config/configuration';

import { TriggerModule } from './trigger.module';

/**
 * Root module of the play command: one manual trigger, then exit.
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    TriggerModule,
  ],
})
export class PlayAppModule {}

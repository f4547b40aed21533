import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CommandRunnerService } from './command-runner.service';
import { FakePlatformActions } from './fake/fake-platform-actions.service';
import { COMMAND_RUNNER, PLATFORM_ACTIONS, PLATFORM_COMMANDS } from './platform.constants';
import { platformCommandsFor } from './platform-commands';
import { ShellPlatformActions } from './shell-platform-actions.service';

/**
 * Platform Module
 *
 * Gateway between the application and the operating system: wake the
 * display, set the volume, open a URL. The implementation is picked once
 * at startup from ACTION_PROVIDER and the running platform.
 */
@Module({
  imports: [],
  providers: [
    { provide: COMMAND_RUNNER, useClass: CommandRunnerService },
    { provide: PLATFORM_COMMANDS, useValue: platformCommandsFor(process.platform) },
    ShellPlatformActions,
    FakePlatformActions,

    // The abstraction token → shell or fake implementation
    {
      provide: PLATFORM_ACTIONS,
      useFactory: (
        configService: ConfigService,
        shell: ShellPlatformActions,
        fake: FakePlatformActions,
      ) => (configService.get<string>('actionProvider', 'shell') === 'fake' ? fake : shell),
      inject: [ConfigService, ShellPlatformActions, FakePlatformActions],
    },
  ],
  exports: [PLATFORM_ACTIONS, COMMAND_RUNNER, PLATFORM_COMMANDS],
})
export class PlatformModule {}

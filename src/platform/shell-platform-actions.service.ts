import { Inject, Injectable, Logger } from '@nestjs/common';

import { ICommandRunner, IPlatformActions } from './interfaces';
import { COMMAND_RUNNER, PLATFORM_COMMANDS } from './platform.constants';
import { CommandLine, PlatformCommands } from './platform-commands';

/**
 * Platform actions backed by OS commands, chosen once at startup from
 * the platform's command table.
 */
@Injectable()
export class ShellPlatformActions implements IPlatformActions {
  private readonly logger = new Logger(ShellPlatformActions.name);

  constructor(
    @Inject(COMMAND_RUNNER) private readonly runner: ICommandRunner,
    @Inject(PLATFORM_COMMANDS) private readonly commands: PlatformCommands,
  ) {}

  async wake(): Promise<void> {
    if (!this.commands.wake) {
      this.logger.debug(`Wake is not supported on ${this.commands.platform}`);
      return;
    }

    await this.exec(this.commands.wake);
    this.logger.log(`System wake command executed (${this.commands.platform})`);
  }

  async setVolume(percent: number): Promise<void> {
    if (!this.commands.setVolume) {
      this.logger.debug(`Volume control is not supported on ${this.commands.platform}`);
      return;
    }

    const level = Math.round(Math.min(100, Math.max(0, percent)));
    await this.exec(this.commands.setVolume(level));
    this.logger.log(`Volume set to ${level}%`);
  }

  async openUrl(url: string): Promise<void> {
    await this.exec(this.commands.openUrl(url));
  }

  private async exec([command, ...args]: CommandLine): Promise<void> {
    this.logger.debug(`Running ${command} ${args.join(' ')}`);
    await this.runner.run(command, args);
  }
}

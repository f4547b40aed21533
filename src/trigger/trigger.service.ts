import { setTimeout as sleep } from 'timers/promises';

import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { PRAYER_NAMES, PrayerName } from '../common/types/prayer-name';
import { TriggerOutcome } from '../common/types/trigger-outcome';
import { isPlaceholderUrl, PlayerMode, PrayerVideos } from '../config/ezan-config.schema';
import { IPlatformActions } from '../platform/interfaces';
import { PLATFORM_ACTIONS } from '../platform/platform.constants';

/**
 * Service that performs one prayer's trigger: wake the machine, set the
 * volume and open the prayer's video in the browser.
 * Never throws; every failure is logged and reflected in the outcome.
 */
@Injectable()
export class TriggerService implements OnModuleInit {
  private readonly logger = new Logger(TriggerService.name);

  private readonly videos: PrayerVideos;
  private readonly volume: number;
  private readonly wakeDelayMs: number;
  private readonly mode: PlayerMode;

  constructor(
    @Inject(PLATFORM_ACTIONS) private readonly platform: IPlatformActions,
    private readonly configService: ConfigService,
  ) {
    this.videos = this.configService.getOrThrow<PrayerVideos>('ezan.videos');
    this.volume = this.configService.get<number>('ezan.volume', 65);
    this.wakeDelayMs = this.configService.get<number>('ezan.wakeDelaySeconds', 2) * 1000;
    this.mode = this.configService.get<PlayerMode>('ezan.mode', 'home');
  }

  onModuleInit() {
    const placeholders = PRAYER_NAMES.filter((name) => isPlaceholderUrl(this.videos[name]));

    if (placeholders.length > 0) {
      this.logger.warn(
        `${placeholders.length} placeholder video URL(s) need to be replaced: ${placeholders.join(', ')}`,
      );
    }

    if (this.mode === 'office') {
      this.logger.log('Office mode active - prayer videos will be skipped');
    }
  }

  /**
   * Run the trigger for a prayer.
   */
  async fire(prayer: PrayerName): Promise<TriggerOutcome> {
    if (this.mode === 'office') {
      this.logger.log(`Office mode active - skipping ${prayer} ezan`);
      return 'skipped';
    }

    const url = this.videos[prayer];
    if (!url || isPlaceholderUrl(url)) {
      this.logger.error(`No valid video URL configured for ${prayer}`);
      return 'skipped';
    }

    try {
      await this.platform.wake();
    } catch (error) {
      this.logger.error(`Failed to wake system: ${this.describe(error)}`);
    }

    if (this.wakeDelayMs > 0) {
      await sleep(this.wakeDelayMs);
    }

    try {
      await this.platform.setVolume(this.volume);
    } catch (error) {
      this.logger.error(`Failed to set volume to ${this.volume}%: ${this.describe(error)}`);
    }

    try {
      await this.platform.openUrl(url);
    } catch (error) {
      this.logger.error(`Failed to open ${prayer} ezan video ${url}: ${this.describe(error)}`);
      return 'failed';
    }

    this.logger.log(`Playing ${prayer} ezan video: ${url}`);
    return 'played';
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { format } from 'date-fns';

import { PrayerName, prayerLabel } from '../common/types/prayer-name';
import { TriggerOutcome } from '../common/types/trigger-outcome';
import { DailyCacheService } from '../persistence/daily-cache.service';
import { currentPrayers, PrayerSchedule, prayersBetween } from '../prayer-time/prayer-schedule';
import { PrayerTimeService } from '../prayer-time/prayer-time.service';
import { TriggerService } from '../trigger/trigger.service';

/**
 * State of the current day. Replaced wholesale at rollover.
 */
interface DayState {
  /** yyyy-MM-dd, null before the first tick */
  date: string | null;
  schedule: PrayerSchedule | null;
  consumed: Set<PrayerName>;
  /** Last tick that evaluated the schedule, null until one has */
  lastTickAt: Date | null;
}

export const PRAYER_POLL_INTERVAL = 'prayer-poll';

/**
 * Polling loop that fetches each day's prayer times and fires a trigger when
 * a prayer's time is reached. Each prayer fires at most once per day.
 */
@Injectable()
export class SchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly pollIntervalMs: number;

  private state: DayState = { date: null, schedule: null, consumed: new Set(), lastTickAt: null };
  private ticking = false;

  constructor(
    private readonly prayerTimeService: PrayerTimeService,
    private readonly dailyCache: DailyCacheService,
    private readonly triggerService: TriggerService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
  ) {
    this.pollIntervalMs = this.configService.get<number>('ezan.pollIntervalSeconds', 30) * 1000;
  }

  async onModuleInit() {
    const interval = setInterval(() => void this.runTick(), this.pollIntervalMs);
    this.schedulerRegistry.addInterval(PRAYER_POLL_INTERVAL, interval);

    this.logger.log(
      `Ezan player started for ${this.prayerTimeService.locationLabel}, ` +
        `checking every ${this.pollIntervalMs / 1000}s`,
    );

    await this.runTick();
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', PRAYER_POLL_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(PRAYER_POLL_INTERVAL);
      this.logger.log('Stopped polling');
    }
  }

  /**
   * One pass of the loop: roll over at midnight, make sure today's schedule
   * is loaded, then fire the prayers of the current window not yet triggered.
   * Skipped when the previous tick is still running.
   */
  async tick(now: Date = new Date()): Promise<void> {
    if (this.ticking) {
      this.logger.debug('Previous tick still running; skipping');
      return;
    }

    this.ticking = true;
    try {
      this.rollover(now);

      const schedule = this.state.schedule ?? (await this.loadSchedule(now));
      if (!schedule) return;

      await this.fireDue(schedule, now);
    } finally {
      this.ticking = false;
    }
  }

  /** Today's schedule, or null until a fetch succeeds */
  getSchedule(): PrayerSchedule | null {
    return this.state.schedule;
  }

  /** Prayers already triggered today, in prayer order */
  getConsumed(): PrayerName[] {
    const schedule = this.state.schedule;
    if (!schedule) return [...this.state.consumed];

    return schedule.entries.map((e) => e.name).filter((name) => this.state.consumed.has(name));
  }

  private async runTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      if (error instanceof Error) {
        this.logger.error(`Scheduler tick failed: ${error.message}`, error.stack);
      } else {
        this.logger.error(`Scheduler tick failed: ${String(error)}`);
      }
    }
  }

  private rollover(now: Date): void {
    const today = format(now, 'yyyy-MM-dd');
    if (this.state.date === today) return;

    if (this.state.date !== null) {
      this.logger.log(`Date changed from ${this.state.date} to ${today}; clearing schedule`);
    }

    this.state = { date: today, schedule: null, consumed: new Set(), lastTickAt: null };
  }

  /**
   * Fetch today's schedule and restore the prayers already triggered today.
   * Returns null on failure; the next tick retries.
   */
  private async loadSchedule(now: Date): Promise<PrayerSchedule | null> {
    let schedule: PrayerSchedule;
    try {
      schedule = await this.prayerTimeService.getSchedule(now);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to fetch prayer times for ${this.state.date}: ${message}`);
      return null;
    }

    const consumed = await this.dailyCache.getConsumed(schedule.date);
    for (const entry of consumed) {
      this.state.consumed.add(entry.prayer);
    }

    if (consumed.length > 0) {
      this.logger.log(`Already triggered today: ${consumed.map((c) => c.prayer).join(', ')}`);
    }

    this.state.schedule = schedule;
    return schedule;
  }

  /**
   * First evaluation of a schedule: the prayers of the current window.
   * Later ticks: every prayer reached since the previous tick, so a
   * suspension spanning several prayers fires each of them once.
   */
  private async fireDue(schedule: PrayerSchedule, now: Date): Promise<void> {
    const since = this.state.lastTickAt;
    this.state.lastTickAt = now;

    const reached = since
      ? prayersBetween(schedule, since, now)
      : currentPrayers(schedule, now);
    const due = reached.filter((entry) => !this.state.consumed.has(entry.name));

    for (const entry of due) {
      this.state.consumed.add(entry.name);
      this.logger.log(`Time for ${prayerLabel(entry.name)} (${entry.time})`);

      const outcome = await this.triggerService.fire(entry.name);
      await this.recordConsumed(schedule.date, entry.name, outcome, now);
    }
  }

  private async recordConsumed(
    date: string,
    prayer: PrayerName,
    outcome: TriggerOutcome,
    at: Date,
  ): Promise<void> {
    try {
      await this.dailyCache.markConsumed(date, prayer, outcome, at);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to record ${prayer} as triggered: ${message}`);
    }
  }
}

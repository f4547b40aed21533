import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { format } from 'date-fns';

import { prayerLabel } from '../common/types/prayer-name';
import { readTailLines } from '../common/utils/json-file';
import { PlayerMode } from '../config/ezan-config.schema';
import { ICommandRunner } from '../platform/interfaces';
import { COMMAND_RUNNER, PLATFORM_COMMANDS } from '../platform/platform.constants';
import { PlatformCommands } from '../platform/platform-commands';
import { nextPrayer, PrayerSchedule, PrayerTimeEntry } from '../prayer-time/prayer-schedule';
import { PrayerTimeService } from '../prayer-time/prayer-time.service';

import { formatLogLine } from './log-line';

const PROCESS_NAME = 'ezan-player';
const LOG_TAIL_LINES = 5;

export interface ProcessInfo {
  pid: number;
  elapsed: string;
  command: string;
}

export interface StatusReport {
  generatedAt: Date;
  service: string;
  /** null when the process list could not be read */
  processes: ProcessInfo[] | null;
  logFile: string;
  /** null when there is no log file yet */
  recentLogs: string[] | null;
  location: string;
  schedule: PrayerSchedule | null;
  scheduleError: string | null;
  next: PrayerTimeEntry | null;
  volume: number;
  mode: PlayerMode;
}

/**
 * Read-only health report for the running player: service manager state,
 * matching processes, recent log entries and today's prayer times.
 * Never writes the daily cache.
 */
@Injectable()
export class StatusService {
  private readonly logFile: string;
  private readonly serviceLabel: string;
  private readonly serviceUnit: string;

  constructor(
    @Inject(COMMAND_RUNNER) private readonly runner: ICommandRunner,
    @Inject(PLATFORM_COMMANDS) private readonly platformCommands: PlatformCommands,
    private readonly prayerTimeService: PrayerTimeService,
    private readonly configService: ConfigService,
  ) {
    this.logFile = this.configService.get<string>('paths.logFile', './logs/ezan-player.log');
    this.serviceLabel = this.configService.get<string>('ezan.service.label', 'com.ezanplayer');
    this.serviceUnit = this.configService.get<string>('ezan.service.unit', 'ezan-player');
  }

  async collect(now: Date = new Date()): Promise<StatusReport> {
    const [service, processes, recentLogs, fetched] = await Promise.all([
      this.getServiceState(),
      this.getProcesses(),
      this.getRecentLogs(),
      this.fetchSchedule(now),
    ]);

    return {
      generatedAt: now,
      service,
      processes,
      logFile: this.logFile,
      recentLogs,
      location: this.prayerTimeService.locationLabel,
      schedule: fetched.schedule,
      scheduleError: fetched.error,
      next: fetched.schedule ? nextPrayer(fetched.schedule, now) : null,
      volume: this.configService.get<number>('ezan.volume', 65),
      mode: this.configService.get<PlayerMode>('ezan.mode', 'home'),
    };
  }

  /**
   * State of the background service as the OS service manager sees it.
   */
  async getServiceState(): Promise<string> {
    switch (this.platformCommands.platform) {
      case 'darwin':
        return this.getLaunchdState();
      case 'linux':
        return this.getSystemdState();
      default:
        return `unknown (no service manager check on ${this.platformCommands.platform})`;
    }
  }

  /**
   * Running player processes, excluding this one.
   */
  async getProcesses(): Promise<ProcessInfo[] | null> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner.run('ps', ['-eo', 'pid=,etime=,args=']));
    } catch {
      return null;
    }

    const processes: ProcessInfo[] = [];

    for (const line of stdout.split('\n')) {
      const match = line.match(/^\s*(\d+)\s+(\S+)\s+(.+)$/);
      if (!match || !match[3].includes(PROCESS_NAME)) continue;

      const pid = parseInt(match[1], 10);
      if (pid === process.pid) continue;

      processes.push({ pid, elapsed: match[2], command: match[3].trim() });
    }

    return processes;
  }

  async getRecentLogs(count = LOG_TAIL_LINES): Promise<string[] | null> {
    const lines = await readTailLines(this.logFile, count);
    return lines?.map(formatLogLine) ?? null;
  }

  render(report: StatusReport): string {
    const lines: string[] = ['Ezan Player Status', '=================='];

    lines.push(`Service:   ${report.service}`);
    lines.push(`Time:      ${format(report.generatedAt, 'yyyy-MM-dd HH:mm:ss')}`);
    lines.push(`Location:  ${report.location}`);
    lines.push(`Mode:      ${report.mode}`);
    lines.push(`Volume:    ${report.volume}%`);

    lines.push('', 'Processes:');
    if (report.processes === null) {
      lines.push('  (could not list processes)');
    } else if (report.processes.length === 0) {
      lines.push('  none running');
    } else {
      for (const p of report.processes) {
        lines.push(`  ${p.pid}  ${p.elapsed}  ${p.command}`);
      }
    }

    lines.push('', `Recent log (${report.logFile}):`);
    if (report.recentLogs === null) {
      lines.push('  (no log file yet)');
    } else if (report.recentLogs.length === 0) {
      lines.push('  (empty)');
    } else {
      lines.push(...report.recentLogs.map((line) => `  ${line}`));
    }

    lines.push('');
    if (!report.schedule) {
      lines.push(`Prayer times unavailable: ${report.scheduleError ?? 'unknown error'}`);
      return lines.join('\n');
    }

    lines.push(`Prayer times for ${report.schedule.date} (${report.schedule.source}):`);
    for (const entry of report.schedule.entries) {
      const marker =
        entry.name === report.next?.name
          ? '  NEXT'
          : entry.atMs <= report.generatedAt.getTime()
            ? '  done'
            : '';
      lines.push(`  ${prayerLabel(entry.name).padEnd(8)} ${entry.time}${marker}`);
    }

    lines.push('');
    lines.push(
      report.next
        ? `Next prayer: ${prayerLabel(report.next.name)} at ${report.next.time}`
        : 'Next prayer: none left today',
    );

    return lines.join('\n');
  }

  private async getLaunchdState(): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner.run('launchctl', ['list']));
    } catch (error) {
      return `unknown (${this.describe(error)})`;
    }

    for (const line of stdout.split('\n')) {
      const [pid, status, label] = line.trim().split(/\s+/);
      if (label !== this.serviceLabel) continue;

      return pid === '-'
        ? `loaded, not running (last exit status ${status})`
        : `running (PID ${pid})`;
    }

    return `not loaded (${this.serviceLabel})`;
  }

  private async getSystemdState(): Promise<string> {
    try {
      const { stdout } = await this.runner.run('systemctl', ['--user', 'is-active', this.serviceUnit]);
      return `${stdout.trim()} (${this.serviceUnit})`;
    } catch {
      // is-active exits non-zero for every state but "active"
      return `not active (${this.serviceUnit})`;
    }
  }

  private async fetchSchedule(
    now: Date,
  ): Promise<{ schedule: PrayerSchedule | null; error: string | null }> {
    try {
      return { schedule: await this.prayerTimeService.fetchFresh(now), error: null };
    } catch (error) {
      return { schedule: null, error: this.describe(error) };
    }
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

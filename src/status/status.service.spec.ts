import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { CommandResult } from '../platform/interfaces';
import { COMMAND_RUNNER, PLATFORM_COMMANDS } from '../platform/platform.constants';
import { platformCommandsFor } from '../platform/platform-commands';
import { buildPrayerSchedule, PrayerSchedule } from '../prayer-time/prayer-schedule';
import { PrayerTimeFetchError } from '../prayer-time/prayer-time-fetch.error';
import { PrayerTimeService } from '../prayer-time/prayer-time.service';

import { StatusService } from './status.service';

describe('StatusService', () => {
  let service: StatusService;
  let tempDir: string;
  let logFile: string;
  let platform: NodeJS.Platform;
  let outputs: Record<string, string | Error>;

  const now = new Date('2025-03-17T13:10:00');
  const schedule = buildPrayerSchedule(
    now,
    { fajr: '06:00', dhuhr: '13:00', asr: '16:30', maghrib: '19:45', isha: '21:15' },
    'aladhan',
  );

  const runner = {
    run: jest.fn(async (command: string): Promise<CommandResult> => {
      const output = outputs[command];
      if (output === undefined) throw new Error(`spawn ${command} ENOENT`);
      if (output instanceof Error) throw output;
      return { stdout: output, stderr: '' };
    }),
  };

  const prayerTimeService = {
    locationLabel: 'Barcelona, Spain',
    fetchFresh: jest.fn<Promise<PrayerSchedule>, [Date]>(),
  };

  const mockConfigService = {
    get: jest.fn((key: string, defaultValue: unknown) => {
      if (key === 'paths.logFile') return logFile;
      if (key === 'ezan.volume') return 40;
      return defaultValue;
    }),
  };

  const createService = async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StatusService,
        { provide: COMMAND_RUNNER, useValue: runner },
        { provide: PLATFORM_COMMANDS, useValue: platformCommandsFor(platform) },
        { provide: PrayerTimeService, useValue: prayerTimeService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<StatusService>(StatusService);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ezan-status-'));
    logFile = path.join(tempDir, 'ezan-player.log');
    platform = 'linux';
    outputs = {};
    runner.run.mockClear();
    prayerTimeService.fetchFresh.mockReset().mockResolvedValue(schedule);

    await createService();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('getServiceState', () => {
    it('should report the systemd user unit state on linux', async () => {
      outputs.systemctl = 'active\n';

      expect(await service.getServiceState()).toBe('active (ezan-player)');
      expect(runner.run).toHaveBeenCalledWith('systemctl', ['--user', 'is-active', 'ezan-player']);
    });

    it('should report an inactive unit when systemctl exits non-zero', async () => {
      outputs.systemctl = new Error('systemctl failed (Command failed): inactive');

      expect(await service.getServiceState()).toBe('not active (ezan-player)');
    });

    it('should find the launchd job on darwin', async () => {
      platform = 'darwin';
      await createService();
      outputs.launchctl = 'PID\tStatus\tLabel\n-\t0\tcom.apple.other\n812\t0\tcom.ezanplayer\n';

      expect(await service.getServiceState()).toBe('running (PID 812)');
    });

    it('should report a loaded launchd job that is not running', async () => {
      platform = 'darwin';
      await createService();
      outputs.launchctl = 'PID\tStatus\tLabel\n-\t78\tcom.ezanplayer\n';

      expect(await service.getServiceState()).toBe('loaded, not running (last exit status 78)');
    });

    it('should report a missing launchd job', async () => {
      platform = 'darwin';
      await createService();
      outputs.launchctl = 'PID\tStatus\tLabel\n';

      expect(await service.getServiceState()).toBe('not loaded (com.ezanplayer)');
    });

    it('should be unknown on other platforms', async () => {
      platform = 'win32';
      await createService();

      expect(await service.getServiceState()).toBe('unknown (no service manager check on win32)');
      expect(runner.run).not.toHaveBeenCalled();
    });
  });

  describe('getProcesses', () => {
    it('should list player processes other than this one', async () => {
      outputs.ps = [
        '    1 10-02:00:00 /sbin/init',
        ' 4242    01:02:03 ezan-player',
        `${String(process.pid).padStart(5)}       00:01 node dist/status.js ezan-player`,
        ' 5151       00:10 vim ezan-player.log',
      ].join('\n');

      expect(await service.getProcesses()).toEqual([
        { pid: 4242, elapsed: '01:02:03', command: 'ezan-player' },
        { pid: 5151, elapsed: '00:10', command: 'vim ezan-player.log' },
      ]);
    });

    it('should return null when ps cannot run', async () => {
      expect(await service.getProcesses()).toBeNull();
    });
  });

  describe('getRecentLogs', () => {
    it('should return the last lines, formatted', async () => {
      const entry = (msg: string) =>
        JSON.stringify({
          level: 'info',
          time: '2025-03-17T13:00:05.000Z',
          context: 'SchedulerService',
          msg,
        });
      const lines = ['one', 'two', 'three', 'four', 'five', 'six'].map(entry);
      await fs.writeFile(logFile, `${lines.join('\n')}\nraw tail\n`);

      expect(await service.getRecentLogs()).toEqual([
        '2025-03-17 13:00:05 - INFO - [SchedulerService] three',
        '2025-03-17 13:00:05 - INFO - [SchedulerService] four',
        '2025-03-17 13:00:05 - INFO - [SchedulerService] five',
        '2025-03-17 13:00:05 - INFO - [SchedulerService] six',
        'raw tail',
      ]);
    });

    it('should return null when there is no log file', async () => {
      expect(await service.getRecentLogs()).toBeNull();
    });
  });

  describe('collect', () => {
    it('should fetch a fresh schedule and find the next prayer', async () => {
      const report = await service.collect(now);

      expect(prayerTimeService.fetchFresh).toHaveBeenCalledWith(now);
      expect(report.schedule).toBe(schedule);
      expect(report.next?.name).toBe('asr');
      expect(report.volume).toBe(40);
      expect(report.mode).toBe('home');
    });

    it('should report a failed fetch without throwing', async () => {
      prayerTimeService.fetchFresh.mockRejectedValue(
        new PrayerTimeFetchError('Prayer times request failed with HTTP 503'),
      );

      const report = await service.collect(now);

      expect(report.schedule).toBeNull();
      expect(report.next).toBeNull();
      expect(report.scheduleError).toBe('Prayer times request failed with HTTP 503');
    });
  });

  describe('render', () => {
    it('should print the full report', async () => {
      outputs.systemctl = 'active\n';
      outputs.ps = ' 4242    01:02:03 ezan-player\n';
      const entry = {
        level: 'info',
        time: '2025-03-17T13:00:05.000Z',
        context: 'SchedulerService',
        msg: 'Time for Dhuhr (13:00)',
      };
      await fs.writeFile(logFile, `${JSON.stringify(entry)}\n`);

      const output = service.render(await service.collect(now));

      expect(output.split('\n')).toEqual([
        'Ezan Player Status',
        '==================',
        'Service:   active (ezan-player)',
        'Time:      2025-03-17 13:10:00',
        'Location:  Barcelona, Spain',
        'Mode:      home',
        'Volume:    40%',
        '',
        'Processes:',
        '  4242  01:02:03  ezan-player',
        '',
        `Recent log (${logFile}):`,
        '  2025-03-17 13:00:05 - INFO - [SchedulerService] Time for Dhuhr (13:00)',
        '',
        'Prayer times for 2025-03-17 (aladhan):',
        '  Fajr     06:00  done',
        '  Dhuhr    13:00  done',
        '  Asr      16:30  NEXT',
        '  Maghrib  19:45',
        '  Isha     21:15',
        '',
        'Next prayer: Asr at 16:30',
      ]);
    });

    it('should say when no prayer is left today', async () => {
      const late = new Date('2025-03-17T22:00:00');

      const output = service.render(await service.collect(late));

      expect(output).toContain('  Isha     21:15  done');
      expect(output.endsWith('Next prayer: none left today')).toBe(true);
    });

    it('should print the fetch error instead of the times', async () => {
      prayerTimeService.fetchFresh.mockRejectedValue(
        new Error('Network error fetching prayer times: offline'),
      );

      const output = service.render(await service.collect(now));

      expect(output.split('\n').pop()).toBe(
        'Prayer times unavailable: Network error fetching prayer times: offline',
      );
      expect(output).toContain('  (could not list processes)');
      expect(output).toContain('  (no log file yet)');
    });
  });
});

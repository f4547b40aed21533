import { ConsoleLogger, LoggerService, LogLevel } from '@nestjs/common';
import pino, { DestinationStream, Level, Logger as PinoLogger } from 'pino';

import { LogLevelName } from '../config/configuration';

export interface AppLoggerOptions {
  level: LogLevelName;

  /** Append-only log file; ignored when `destination` is given */
  logFile?: string;

  /** Explicit sink for file entries (tests pass an in-memory stream) */
  destination?: DestinationStream;
}

const NEST_LEVELS: Record<LogLevelName, LogLevel[]> = {
  error: ['fatal', 'error'],
  warn: ['fatal', 'error', 'warn'],
  info: ['fatal', 'error', 'warn', 'log'],
  debug: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
};

type ConsolePrint = (message: unknown, context?: string) => void;

/**
 * Nest logger that prints to the console as usual and appends every entry
 * to the log file as one pino JSON line ({ level, time, context, msg }).
 *
 * Installed with NestFactory.createApplicationContext(..., { logger }), so every
 * `new Logger(Service.name)` in the app ends up here.
 */
export class AppLogger implements LoggerService {
  private readonly console = new ConsoleLogger();
  private readonly file: PinoLogger;

  constructor(options: AppLoggerOptions) {
    this.console.setLogLevels(NEST_LEVELS[options.level]);

    const destination =
      options.destination ??
      pino.destination({
        dest: options.logFile ?? './logs/ezan-player.log',
        append: true,
        mkdir: true,
        sync: true,
      });

    this.file = pino(
      {
        level: options.level === 'debug' ? 'trace' : options.level,
        base: undefined,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
          level: (label) => ({ level: label }),
        },
      },
      destination,
    );
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(this.console.log, 'info', message, this.contextOf(optionalParams));
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(this.console.warn, 'warn', message, this.contextOf(optionalParams));
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(this.console.debug, 'debug', message, this.contextOf(optionalParams));
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(this.console.verbose, 'trace', message, this.contextOf(optionalParams));
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.emit(this.console.fatal, 'fatal', message, this.contextOf(optionalParams));
  }

  /**
   * Nest passes `(message, stack?, context?)` for errors.
   */
  error(message: unknown, ...optionalParams: unknown[]): void {
    const strings = optionalParams.filter((p): p is string => typeof p === 'string');
    const context = strings.length >= 1 ? strings[strings.length - 1] : undefined;
    const stack = strings.length >= 2 ? strings[0] : undefined;

    if (stack !== undefined) {
      this.console.error(message, stack, context);
    } else if (context !== undefined) {
      this.console.error(message, context);
    } else {
      this.console.error(message);
    }

    this.file.error({ context, stack }, this.stringify(message));
  }

  setLogLevels(levels: LogLevel[]): void {
    this.console.setLogLevels(levels);
  }

  private contextOf(optionalParams: unknown[]): string | undefined {
    const last = optionalParams[optionalParams.length - 1];
    return typeof last === 'string' ? last : undefined;
  }

  private emit(
    print: ConsolePrint,
    level: Level,
    message: unknown,
    context: string | undefined,
  ): void {
    // ConsoleLogger prints a trailing undefined as its own line
    if (context !== undefined) {
      print.call(this.console, message, context);
    } else {
      print.call(this.console, message);
    }

    this.file[level]({ context }, this.stringify(message));
  }

  private stringify(message: unknown): string {
    if (typeof message === 'string') return message;
    if (message instanceof Error) return message.message;
    return JSON.stringify(message);
  }
}

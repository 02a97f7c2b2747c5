import pino from 'pino';
import type { ILogger, LogData, LogLevel } from '../../domain/ports/ILogger.js';

/** Fields that may carry credentials; their values never reach the output */
export const REDACTED_PATHS = ['apiKey', '*.apiKey', 'authorization', 'headers.authorization'];

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** Write JSON lines here instead of stdout. Takes precedence over `pretty`. */
  destination?: pino.DestinationStream;
}

function createPino(options: PinoLoggerOptions): pino.Logger {
  const settings: pino.LoggerOptions = {
    name: options.name ?? 'travel-planner',
    level: options.level ?? 'info',
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  if (options.destination) {
    return pino(settings, options.destination);
  }
  if (options.pretty) {
    return pino({
      ...settings,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }
  return pino(settings);
}

function withError(error: unknown, data?: LogData): LogData {
  if (error instanceof Error) return { err: error, ...data };
  if (error === undefined) return { ...data };
  return { error, ...data };
}

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  /**
   * @param base - existing pino instance to wrap (used for child loggers)
   */
  constructor(options: PinoLoggerOptions = {}, base?: pino.Logger) {
    this.logger = base ?? createPino(options);
  }

  trace(message: string, data?: LogData): void {
    this.write('trace', message, data);
  }

  debug(message: string, data?: LogData): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    this.write('error', message, withError(error, data));
  }

  fatal(message: string, error?: unknown, data?: LogData): void {
    this.write('fatal', message, withError(error, data));
  }

  child(bindings: LogData): ILogger {
    return new PinoLogger({}, this.logger.child(bindings));
  }

  private write(level: LogLevel, message: string, data?: LogData): void {
    if (data) {
      this.logger[level](data, message);
    } else {
      this.logger[level](message);
    }
  }
}

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  name?: string;
  /** Default: ROLEGATE_LOG_LEVEL, then `info` */
  level?: LogLevel;
  /** Write somewhere other than stdout (used by tests) */
  destination?: pino.DestinationStream;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createPino(options: LoggerOptions): pino.Logger {
  const envLevel = process.env.ROLEGATE_LOG_LEVEL;
  const pinoOptions: pino.LoggerOptions = {
    name: options.name ?? 'rolegate',
    level: options.level ?? (isLogLevel(envLevel) ? envLevel : 'info'),
  };

  if (options.destination) {
    return pino(pinoOptions, options.destination);
  }

  // Pretty output only for local development
  if (process.env.NODE_ENV === 'development') {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }
  return pino(pinoOptions);
}

/**
 * Logger wrapper for rolegate
 */
export class Logger {
  private constructor(private readonly pino: pino.Logger) {}

  static create(options: LoggerOptions = {}): Logger {
    return new Logger(createPino(options));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, message);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, message);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, message);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error !== undefined) {
      this.pino.error({ detail: error }, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger(this.pino.child(bindings));
  }
}

export const logger = Logger.create();

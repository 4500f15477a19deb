import pino, {
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino";
import { errWithCause } from "pino-std-serializers";

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

/**
 * Minimal structured logger used by the codec factory.
 */
export interface Logger {
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
  /**
   * Creates a child logger whose entries carry the given bindings.
   */
  child(bindings: LogMeta): Logger;
}

export interface LoggerOptions {
  /**
   * Minimum level to emit. Defaults to "info".
   */
  level?: LogLevelName;
  /**
   * Where log lines are written. Defaults to stdout.
   */
  destination?: pino.DestinationStream;
}

/**
 * Logger backed by pino. Errors passed as `err` are serialized with their cause chain.
 */
export class PinoLogger implements Logger {
  protected readonly logger: PinoLoggerBase;

  constructor(options: LoggerOptions = {}, base?: PinoLoggerBase) {
    this.logger = base ?? PinoLogger.create(options);
  }

  private static create(options: LoggerOptions): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      level: options.level ?? "info",
      serializers: { err: errWithCause },
    };
    return options.destination
      ? pino(pinoOpts, options.destination)
      : pino(pinoOpts);
  }

  get level(): string {
    return this.logger.level;
  }

  trace(message: string, meta: LogMeta = {}): void {
    this.logger.trace(meta, message);
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.logger.debug(meta, message);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logger.info(meta, message);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logger.warn(meta, message);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logger.error(meta, message);
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.logger.fatal(meta, message);
  }

  child(bindings: LogMeta): Logger {
    return new PinoLogger({}, this.logger.child(bindings));
  }
}

/**
 * Discards everything. The default logger of a codec factory.
 */
export class NullLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}
  child(): Logger {
    return this;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new PinoLogger(options);
}

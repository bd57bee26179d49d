export type LogMeta = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
}

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export interface LoggerOptions {
  level: LogLevel;
  /** One JSON object per line instead of text */
  json: boolean;
  colorize: boolean;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Parse a level name such as "debug" or "WARN"
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const key = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, key) ? LEVEL_NAMES[key] : undefined;
}

const COLORS: Record<number, string> = {
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m'
};

/**
 * Writes to stderr only; stdout is reserved for command output
 */
export class ConsoleLogger implements ILogger {
  private options: LoggerOptions;

  constructor(
    readonly name: string,
    options: Partial<LoggerOptions> = {}
  ) {
    this.options = { level: LogLevel.INFO, json: false, colorize: false, ...options };
  }

  get level(): LogLevel {
    return this.options.level;
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  debug(message: string, meta?: LogMeta): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    this.write(LogLevel.ERROR, message, meta, error);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta, error?: unknown): void {
    if (level < this.options.level) {
      return;
    }

    const cause = error === undefined ? undefined : error instanceof Error ? error.message : String(error);

    if (this.options.json) {
      console.error(JSON.stringify({
        time: new Date().toISOString(),
        level: LogLevel[level].toLowerCase(),
        logger: this.name,
        message,
        ...(meta && { meta }),
        ...(cause !== undefined && { error: cause })
      }));
      return;
    }

    const tag = this.options.colorize ? `${COLORS[level]}[${LogLevel[level]}]\x1b[0m` : `[${LogLevel[level]}]`;
    let line = `${tag} [${this.name}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }
    if (cause !== undefined) {
      line += `: ${cause}`;
    }
    console.error(line);
  }
}

/**
 * Named loggers sharing one set of options
 */
export class LoggerFactory {
  private static loggers = new Map<string, ConsoleLogger>();
  private static options: Partial<LoggerOptions> = {};

  static getLogger(name: string, overrides: Partial<LoggerOptions> = {}): ConsoleLogger {
    let logger = this.loggers.get(name);
    if (!logger) {
      logger = new ConsoleLogger(name, { ...this.options, ...overrides });
      this.loggers.set(name, logger);
    }
    return logger;
  }

  /**
   * Applies to loggers already handed out as well
   */
  static configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
    this.loggers.forEach(logger => logger.configure(options));
  }
}

export function createChildLogger(parent: ILogger, name: string): ILogger {
  if (parent instanceof ConsoleLogger) {
    return LoggerFactory.getLogger(`${parent.name}.${name}`, { level: parent.level });
  }
  return parent;
}

export const silentLogger: ILogger = new ConsoleLogger('silent', { level: LogLevel.SILENT });

export type Logger = ILogger;

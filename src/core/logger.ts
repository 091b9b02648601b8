// Centralized logging for the AirSDLC tracker

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

type Context = Record<string, unknown>;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  /** Written before every line, e.g. `[air]` */
  prefix?: string;
  timestamps?: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[air]',
  timestamps: false
};

/**
 * Parses a level name from `logging.level` or the command line.
 * Returns undefined for names it does not know.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

/**
 * Leveled logger writing one line per message to the console.
 *
 * Services import the shared `logger`; the CLI reconfigures it once per
 * command through `Logger.configure`.
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the shared logger in place, so modules holding `logger` see the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    const instance = Logger.getInstance();
    instance.config = { ...instance.config, ...config };
  }

  /**
   * Builds a line: `[timestamp] [air] [LEVEL] message {context}`
   */
  format(level: string, message: string, context?: Context): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }
    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }
    parts.push(`[${level}]`, message);
    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private enabled(level: LogLevel): boolean {
    return this.config.level <= level;
  }

  /**
   * Diagnostics shown with `--verbose`
   */
  debug(message: string, context?: Context): void {
    if (this.enabled(LogLevel.DEBUG)) {
      console.debug(this.format('DEBUG', message, context));
    }
  }

  /**
   * Progress of an operation, e.g. a git tag created
   */
  info(message: string, context?: Context): void {
    if (this.enabled(LogLevel.INFO)) {
      console.info(this.format('INFO', message, context));
    }
  }

  /**
   * Something was skipped but the operation went on
   */
  warn(message: string, context?: Context): void {
    if (this.enabled(LogLevel.WARN)) {
      console.warn(this.format('WARN', message, context));
    }
  }

  /**
   * Failures; still shown with `--quiet`
   */
  error(message: string, context?: Context): void {
    if (this.enabled(LogLevel.ERROR)) {
      console.error(this.format('ERROR', message, context));
    }
  }
}

export const logger = Logger.getInstance();

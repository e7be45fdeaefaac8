import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'success', 'warning', 'error', 'highlight'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Log level
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  SUCCESS: 'success',
  WARNING: 'warning',
  ERROR: 'error',
  HIGHLIGHT: 'highlight',
} as const satisfies Record<string, LogLevel>;

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
  /** Sink for regular lines (defaults to console.log) */
  write: (line: string) => void;
  /** Sink for error lines (defaults to console.error) */
  writeError: (line: string) => void;
  /** Clock, replaceable in tests */
  now: () => Date;
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

const LEVEL_ORDER: readonly LogLevel[] = LOG_LEVELS;

const LEVEL_STYLE = {
  debug: { marker: '🔍', color: colors.dim },
  info: { marker: 'ℹ️', color: colors.blue },
  success: { marker: '✅', color: colors.green },
  warning: { marker: '⚠️', color: colors.yellow },
  error: { marker: '❌', color: colors.red },
  highlight: { marker: '🌟', color: colors.bright + colors.magenta },
} as const satisfies Record<LogLevel, { marker: string; color: string }>;

/**
 * Logger class with colored console output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? process.stdout.isTTY === true,
      write: config.write ?? ((line) => console.log(line)),
      writeError: config.writeError ?? ((line) => console.error(line)),
      now: config.now ?? (() => new Date()),
    };
  }

  /**
   * Format date to human readable string (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, '0');
    return `${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  }

  private format(level: LogLevel, message: string): string {
    const style = LEVEL_STYLE[level];
    const text = this.config.useColors ? `${style.color}${message}${colors.reset}` : message;
    return `${this.formatDate(this.config.now())} ${style.marker} ${text}`;
  }

  private log(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;

    const line = this.format(level, message);
    if (level === LogLevel.ERROR) {
      this.config.writeError(line);
    } else {
      this.config.write(line);
    }
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.log(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  highlight(message: string): void {
    this.log(LogLevel.HIGHLIGHT, message);
  }

  /**
   * Check if message should be logged based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }
}

// Default logger instance
export const logger: Logger = new Logger();

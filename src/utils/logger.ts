import type { Logger as LoggerContract } from '../types/logger.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  /** Where formatted lines go. Defaults to console.log */
  write?: (line: string) => void;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

type Color = keyof typeof colors;

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Leveled line logger used by the session when `debug` is enabled and no
 * external logger was supplied. Turned on for the whole process with
 * `DEBUG=courier` (or `DEBUG=*`).
 */
export class Logger implements LoggerContract {
  private level: LogLevel;
  private prefix: string;
  private useTimestamp: boolean;
  private useColors: boolean;
  private write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || this.detectLogLevel();
    this.prefix = options.prefix || 'courier';
    this.useTimestamp = options.timestamp !== false;
    this.useColors = options.colors !== false && this.supportsColors();
    this.write = options.write ?? ((line) => console.log(line));
  }

  private detectLogLevel(): LogLevel {
    const env = process.env.DEBUG || '';
    if (env === '*' || env.includes('courier') || env.includes('*')) {
      return 'debug';
    }
    return 'none';
  }

  private supportsColors(): boolean {
    return Boolean(process.stdout.isTTY) && !process.env.NO_COLOR && process.env.TERM !== 'dumb';
  }

  colorize(text: string, color: Color): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return this.colorize(`[${time}]`, 'gray') + ' ';
  }

  isEnabled(level: Exclude<LogLevel, 'none'>): boolean {
    return levels[level] >= levels[this.level];
  }

  private log(level: Exclude<LogLevel, 'none'>, msgOrObj: string | object, args: unknown[]) {
    if (!this.isEnabled(level)) return;

    let message = typeof msgOrObj === 'string' ? msgOrObj : JSON.stringify(msgOrObj);
    if (args.length > 0) {
      message += ' ' + args.map((arg) => (typeof arg === 'string' ? arg : JSON.stringify(arg))).join(' ');
    }
    if (level === 'warn') message = this.colorize(message, 'yellow');
    if (level === 'error') message = this.colorize(message, 'red');

    const prefix = this.colorize(`[${this.prefix}]`, 'cyan');
    this.write(`${this.formatTimestamp()}${prefix} ${message}`);
  }

  debug(msgOrObj: string | object, ...args: unknown[]) {
    this.log('debug', msgOrObj, args);
  }

  info(msgOrObj: string | object, ...args: unknown[]) {
    this.log('info', msgOrObj, args);
  }

  warn(msgOrObj: string | object, ...args: unknown[]) {
    this.log('warn', msgOrObj, args);
  }

  error(msgOrObj: string | object, ...args: unknown[]) {
    this.log('error', msgOrObj, args);
  }
}

/**
 * Format bytes to human readable
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${(bytes / Math.pow(k, i)).toFixed(1)} ${sizes[i]}`;
}

// Global logger instance
let globalLogger: LoggerContract | null = null;

export function getLogger(): LoggerContract {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

export function setLogger(logger: LoggerContract) {
  globalLogger = logger;
}

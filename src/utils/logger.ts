import { Logger, LogLevel } from '../types/index.js';
import { config } from './config.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Line-oriented console logger.
 * Each entry is `<ISO timestamp> <LEVEL> <message> <json meta>`; entries below
 * LOG_LEVEL are dropped.
 */
class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(level: string) {
    const normalized = level.toLowerCase();
    this.minLevel = isLogLevel(normalized) ? normalized : 'info';
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) {
      return;
    }

    const line = [
      new Date().toISOString(),
      level.toUpperCase().padEnd(5),
      message,
      meta && Object.keys(meta).length > 0 ? safeStringify(meta) : '',
    ]
      .filter(part => part.length > 0)
      .join(' ');

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function safeStringify(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    // Circular structures end up here
    return String(meta);
  }
}

export const logger: Logger = new ConsoleLogger(config.app.logLevel);

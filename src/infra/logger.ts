/**
 * Tagged, levelled console logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(tag: string, message: string, data?: unknown): void;
  info(tag: string, message: string, data?: unknown): void;
  warn(tag: string, message: string, data?: unknown): void;
  error(tag: string, message: string, data?: unknown): void;
}

function formatMessage(level: LogLevel, tag: string, message: string): string {
  const ts = new Date().toISOString();
  return `[${ts}] [${level.toUpperCase()}] [${tag}] ${message}`;
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return ` ${data.stack ?? data.message}`;
  return ` ${JSON.stringify(data)}`;
}

export function createLogger(minLevel: LogLevel = 'info'): Logger {
  function log(level: Exclude<LogLevel, 'silent'>, tag: string, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    const line = formatMessage(level, tag, message) + formatData(data);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  return {
    debug: (tag, msg, data) => log('debug', tag, msg, data),
    info: (tag, msg, data) => log('info', tag, msg, data),
    warn: (tag, msg, data) => log('warn', tag, msg, data),
    error: (tag, msg, data) => log('error', tag, msg, data),
  };
}

export const logger = createLogger();

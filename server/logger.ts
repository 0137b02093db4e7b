import { LogLevel } from './config.js';

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  child: (scope: string) => Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function formatLine(scope: string, level: LogLevel, message: string, now = new Date()): string {
  return `[${scope}] ${now.toISOString()} ${level.toUpperCase()} ${message}`;
}

export function createLogger(scope: string, minLevel: LogLevel = 'info'): Logger {
  const log = (level: LogLevel, message: string) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    const line = formatLine(scope, level, message);
    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
    child: (childScope) => createLogger(`${scope}/${childScope}`, minLevel)
  };
}

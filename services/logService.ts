import { appConfig, type LogLevel } from '../config';

export type LogFields = Record<string, string | number | boolean | null>;

export interface Logger {
  debug: (event: string, fields?: LogFields) => void;
  info: (event: string, fields?: LogFields) => void;
  warn: (event: string, fields?: LogFields) => void;
  error: (event: string, fields?: LogFields) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const CONSOLE_METHOD: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Leveled console logger. Fields are flat scalars so prompt or document
 * payloads cannot be attached to a log line.
 */
export const createLogger = (scope: string, minLevel: LogLevel = appConfig.logLevel): Logger => {
  const write = (level: LogLevel) => (event: string, fields?: LogFields) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    if (fields && Object.keys(fields).length > 0) {
      CONSOLE_METHOD[level](`[${scope}] ${event}`, fields);
    } else {
      CONSOLE_METHOD[level](`[${scope}] ${event}`);
    }
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
};

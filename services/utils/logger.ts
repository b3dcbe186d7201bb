/**
 * Tagged console logger.
 *
 * Every stage logs through a scoped instance (`createLogger('Bulk')`) so lines read
 * `[Bulk] Processing batch 1/4...`. Level is process-wide and set once by the CLI
 * (or silenced by the test setup).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

interface LoggerConfig {
  minLevel: LogLevel;
}

let config: LoggerConfig = { minLevel: 'info' };

export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[config.minLevel];
}

function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

export const createLogger = (tag: string): Logger => {
  const prefix = `[${tag}]`;
  return {
    debug: (message) => {
      if (shouldLog('debug')) console.debug(`${prefix} ${message}`);
    },
    info: (message) => {
      if (shouldLog('info')) console.log(`${prefix} ${message}`);
    },
    warn: (message, error) => {
      if (!shouldLog('warn')) return;
      if (error === undefined) console.warn(`${prefix} ${message}`);
      else console.warn(`${prefix} ${message} (${describeError(error)})`);
    },
    error: (message, error) => {
      if (!shouldLog('error')) return;
      if (error === undefined) console.error(`${prefix} ${message}`);
      else console.error(`${prefix} ${message} (${describeError(error)})`);
    },
  };
};

import { environment } from '../../environments/environment';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveThreshold(): number {
  const level = environment.logLevel.toLowerCase();
  return isLogLevel(level) ? LEVEL_ORDER[level] : LEVEL_ORDER.info;
}

/**
 * Tagged console logger, e.g. `[METRICS-PIPELINE] Finalized bucket 3`
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const threshold = resolveThreshold();
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.log(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    }
  };
}

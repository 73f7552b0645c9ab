export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let currentLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Scoped console logger. Every line is prefixed with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...args) {
      if (enabled('debug')) console.log(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}

export const logger = createLogger('Trackbeam');

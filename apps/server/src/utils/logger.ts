/**
 * Simple logger utility for services.
 *
 * Fastify owns request logging through pino; services that run outside a
 * request (auth polling, playback relay, background jobs) log through this.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, context?: Record<string, unknown>) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function currentLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : 'info';
}

/**
 * Create a logger instance with optional namespace prefix.
 */
export function createLogger(namespace?: string): Logger {
  const prefix = namespace ? `[${namespace}] ` : '';
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];

  return {
    debug: (message: string, context?: Record<string, unknown>) => {
      if (enabled('debug')) {
        console.debug(prefix + message, context ?? '');
      }
    },
    info: (message: string, context?: Record<string, unknown>) => {
      if (enabled('info')) {
        console.info(prefix + message, context ?? '');
      }
    },
    warn: (message: string, context?: Record<string, unknown>) => {
      if (enabled('warn')) {
        console.warn(prefix + message, context ?? '');
      }
    },
    error: (message: string, context?: Record<string, unknown>) => {
      console.error(prefix + message, context ?? '');
    },
  };
}

/** Logger that drops everything, for tests and embedding */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

import pino from 'pino';

/**
 * Log levels by environment. Tests stay silent unless LOG_LEVEL says otherwise.
 */
const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent'
} as const;

export const LOG_LEVEL_NAMES = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const isKnownEnvironment = (value: string): value is keyof typeof LOG_LEVELS => value in LOG_LEVELS;

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVEL_NAMES.some((level) => level === value);

/**
 * An unrecognised LOG_LEVEL falls back to the environment's default; `loadEnv` reports it.
 */
const resolveLogLevel = (env: Record<string, string | undefined> = process.env): LogLevel => {
  if (env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL)) {
    return env.LOG_LEVEL;
  }

  const nodeEnv = env.NODE_ENV ?? 'development';
  return isKnownEnvironment(nodeEnv) ? LOG_LEVELS[nodeEnv] : 'info';
};

const prettyTransport = (): pino.TransportSingleOptions => ({
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '[{context}] {msg}'
  }
});

const baseLogger = pino({
  level: resolveLogLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    }
  },
  redact: ['apiKey', 'headers["X-Goog-Api-Key"]'],
  ...(process.env.LOG_PRETTY === 'true' ? { transport: prettyTransport() } : {})
});

export type Logger = pino.Logger;

/**
 * Root logger for the workspace.
 *
 * Usage:
 * ```typescript
 * import { logger } from '@wayfarer/logger';
 *
 * logger.info({ api: 'Geocoding' }, 'GET request');
 * ```
 *
 * Set the level with `LOG_LEVEL=debug`, and `LOG_PRETTY=true` for human-readable output.
 */
export const logger: Logger = baseLogger;

/**
 * Create a child logger bound to a context name.
 *
 * @example
 * ```typescript
 * const log = createLogger('rate-limiter');
 * log.info({ api: 'TimeZone', sleepMs: 2000 }, 'throttling');
 * ```
 */
export function createLogger(context: string, parent: Logger = baseLogger): Logger {
  return parent.child({ context });
}

export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
}

export { resolveLogLevel };

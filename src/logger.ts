/**
 * Logging infrastructure using pino
 */

import pino from 'pino';

/**
 * Log levels
 */
export type LogLevel =
  | 'trace'
  | 'debug'
  | 'info'
  | 'warn'
  | 'error'
  | 'fatal'
  | 'silent';

/**
 * Create logger instance
 *
 * Output always goes to stderr so the catalog can be piped from stdout by
 * whatever embeds the library. Tests run silent unless LOG_LEVEL says otherwise.
 */
export function createLogger(level: LogLevel = 'info'): pino.Logger {
  const env = process.env.NODE_ENV;
  const resolvedLevel =
    process.env.LOG_LEVEL || (env === 'test' ? 'silent' : level);

  // Terminal mode: pretty printing
  if (process.stderr.isTTY && env !== 'production' && env !== 'test') {
    return pino({
      level: resolvedLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(
    { level: resolvedLevel },
    pino.destination({ dest: 2, sync: false }),
  );
}

/**
 * Default logger instance
 */
export const logger = createLogger();

/**
 * Create child logger with additional context
 */
export function createChildLogger(
  bindings: Record<string, unknown>,
): pino.Logger {
  return logger.child(bindings);
}

/**
 * jwt-session-kit - Logging
 *
 * One pino root logger, JSON to stderr, quiet unless JWTKIT_LOG_LEVEL says
 * otherwise. Components take a child via `createLogger`.
 *
 *   logger.debug({ sub, jti }, 'Token issued');
 *   logger.warn({ kind: error.kind }, 'Request rejected');
 */

import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVEL_ENV = 'JWTKIT_LOG_LEVEL';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Never log key material or tokens.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'privateKey',
    'publicKey',
    'secret',
    '*.token',
    '*.privateKey',
    '*.secret',
    'headers.authorization',
    'headers.Authorization',
  ],
  censor: '[REDACTED]',
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Level from the environment; unknown values fall back to `silent`.
 */
export function resolveLogLevel(value: string | undefined = process.env[LOG_LEVEL_ENV]): LogLevel {
  const level = value?.toLowerCase();
  return level && isLogLevel(level) ? level : 'silent';
}

function createRootLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    // stdout belongs to the CLI's output
    pino.destination({ dest: 2, sync: true })
  );
}

let rootLogger: Logger | null = null;

export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Child logger tagged with `component`.
 */
export function createLogger(component: string): Logger {
  return getRootLogger().child({ component });
}

/**
 * Logger
 *
 * Pino-based structured logger shared by every workspace.
 * Log lines go to stderr; stdout belongs to command output.
 */

import { pino, type LoggerOptions } from 'pino';

export const LOG_FD = 2;

export function buildLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const nodeEnv = env['NODE_ENV'] ?? 'development';
  return {
    level: env['LOG_LEVEL'] ?? (nodeEnv === 'test' ? 'silent' : 'info'),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'tunegrab',
      env: nodeEnv,
    },
    redact: ['accessToken', 'refreshToken', 'credential.accessToken', 'credential.refreshToken'],
    transport: nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        destination: LOG_FD,
      },
    } : undefined,
  };
}

const options = buildLoggerOptions();

export const logger = options.transport
  ? pino(options)
  : pino(options, pino.destination(LOG_FD));

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

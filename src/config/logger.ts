import pino from 'pino';

/**
 * Logger Configuration
 *
 * Creates a Pino logger instance for structured logging across the gateway.
 *
 * Log Levels:
 * - debug: Detailed debugging information (lookups, mapping decisions)
 * - info: General informational messages (lead ingested, event recorded)
 * - warn: Warning messages (signature bypass, transfer failures, fallbacks)
 * - error: Error messages (store failures, lookup failures, publish failures)
 */

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

// Tests run silent and without the pretty transport worker
const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'debug'),
  transport:
    !isProduction && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = pino.Logger;

/**
 * Create a child logger with additional context
 *
 * Example:
 * const callLogger = createChildLogger({ correlationId, conversationId: 'conv_123' });
 * callLogger.info('Processing post-call payload');
 */
export const createChildLogger = (context: Record<string, unknown>): Logger => {
  return logger.child(context);
};

export default logger;

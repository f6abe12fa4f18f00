import { type DestinationStream, type Logger, destination as pinoDestination, pino } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

/**
 * JSON logs go to stderr; stdout belongs to the conversation.
 */
export function createLogger(
  level: LogLevel,
  destination: DestinationStream = pinoDestination({ dest: 2, sync: true }),
): Logger {
  return pino({ name: 'assistant-bot', level }, destination);
}

/**
 * Reports a startup or loop failure. Without a configured logger (for
 * example when the configuration itself was rejected) a default one is used.
 */
export function logFatal(err: unknown, logger: Logger = createLogger('error')): void {
  logger.fatal({ err }, 'Failed to run assistant bot');
}

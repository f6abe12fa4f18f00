import type { LogLevel } from '../infrastructure/config.js';
import { createLogger } from '../infrastructure/logger.js';

/** A real pino logger whose JSON lines are parsed into `lines`. */
export function captureLogger(level: LogLevel = 'debug') {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger(level, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

import { DomainError, NotFoundError } from '@contact-desk/domain-kernel';
import { ZodError } from 'zod';
import type { Logger } from '../infrastructure/logger.js';
import type { CommandHandler } from './handlers/types.js';

export const MISSING_ARGUMENT_MESSAGE = 'Enter the argument for the command.';
export const UNEXPECTED_ERROR_MESSAGE = 'Unexpected error. See logs for details.';

/** Turns anything a handler throws into the reply shown to the user. */
export function renderCommandError(err: unknown, logger: Logger): string {
  if (err instanceof NotFoundError) {
    return `Error: ${err.message}.`;
  }
  if (err instanceof DomainError) {
    return err.message;
  }
  if (err instanceof ZodError) {
    return MISSING_ARGUMENT_MESSAGE;
  }

  logger.error({ err }, 'Unhandled command error');
  return UNEXPECTED_ERROR_MESSAGE;
}

export function withInputErrors(
  handler: CommandHandler,
  logger: Logger,
): CommandHandler {
  return (args, book) => {
    try {
      return handler(args, book);
    } catch (err) {
      return renderCommandError(err, logger);
    }
  };
}

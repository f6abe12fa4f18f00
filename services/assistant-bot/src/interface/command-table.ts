import type { Logger } from '../infrastructure/logger.js';
import {
  addBirthday,
  addContact,
  changeContact,
  type CommandHandler,
  createBirthdaysHandler,
  deleteContact,
  removePhone,
  showAll,
  showBirthday,
  showPhone,
} from './handlers/index.js';
import { withInputErrors } from './input-error.js';

export interface CommandTableOptions {
  clock: () => Date;
  windowDays: number;
  logger: Logger;
}

export type CommandTable = ReadonlyMap<string, CommandHandler>;

/** Every handler in the table is already wrapped and never throws. */
export function createCommandTable({
  clock,
  windowDays,
  logger,
}: CommandTableOptions): CommandTable {
  const handlers: Record<string, CommandHandler> = {
    add: addContact,
    change: changeContact,
    phone: showPhone,
    'remove-phone': removePhone,
    delete: deleteContact,
    all: showAll,
    'add-birthday': addBirthday,
    'show-birthday': showBirthday,
    birthdays: createBirthdaysHandler({ clock, windowDays }),
  };

  return new Map(
    Object.entries(handlers).map(
      ([command, handler]): [string, CommandHandler] => [
        command,
        withInputErrors(handler, logger),
      ],
    ),
  );
}

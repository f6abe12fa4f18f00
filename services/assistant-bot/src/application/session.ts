import type { AddressBook } from '@contact-desk/address-book-domain';
import type { Logger } from '../infrastructure/logger.js';
import type { CommandTable } from '../interface/command-table.js';
import { parseInput } from '../interface/parse-input.js';

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['close', 'exit']);

export interface SessionReply {
  reply: string;
  done: boolean;
}

export interface AssistantSession {
  handle(line: string): SessionReply;
}

export interface SessionOptions {
  book: AddressBook;
  commands: CommandTable;
  logger: Logger;
}

export function createSession({
  book,
  commands,
  logger,
}: SessionOptions): AssistantSession {
  return {
    handle(line) {
      const parsed = parseInput(line);
      if (!parsed) {
        return { reply: 'Enter a command.', done: false };
      }

      const { command, args } = parsed;
      if (EXIT_COMMANDS.has(command)) {
        return { reply: 'Good bye!', done: true };
      }
      if (command === 'hello') {
        return { reply: 'How can I help you?', done: false };
      }

      const handler = commands.get(command);
      if (!handler) {
        logger.debug({ command }, 'Unknown command');
        return { reply: 'Invalid command.', done: false };
      }

      logger.debug({ command, argCount: args.length }, 'Dispatching command');
      return { reply: handler(args, book), done: false };
    },
  };
}

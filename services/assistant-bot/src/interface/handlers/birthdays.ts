import {
  addBirthdayCommand,
  ContactRecord,
  contactLookupCommand,
} from '@contact-desk/address-book-domain';
import { requireContact } from './contacts.js';
import type { CommandHandler } from './types.js';

export const addBirthday: CommandHandler = (args, book) => {
  const { name, birthday } = addBirthdayCommand(args);

  const existing = book.find(name);
  if (!existing) {
    // A rejected date must not leave an empty contact in the book.
    const record = ContactRecord.create(name);
    record.addBirthday(birthday);
    book.addRecord(record);
    return `Contact '${name}' created with birthday ${birthday}.`;
  }

  existing.addBirthday(birthday);
  return `Birthday ${birthday} added to contact '${name}'.`;
};

export const showBirthday: CommandHandler = (args, book) => {
  const { name } = contactLookupCommand(args);
  const record = requireContact(book, name);

  if (!record.birthday) {
    return `Error: Contact '${name}' has no birthday.`;
  }
  return `Birthday of ${name} is ${record.birthday.format()}`;
};

export interface BirthdaysHandlerOptions {
  clock: () => Date;
  windowDays: number;
}

export function createBirthdaysHandler({
  clock,
  windowDays,
}: BirthdaysHandlerOptions): CommandHandler {
  return (_args, book) => {
    const upcoming = book.upcomingBirthdays(clock(), windowDays);
    if (upcoming.length === 0) {
      return 'No upcoming birthdays.';
    }
    return [
      'Upcoming birthdays:',
      ...upcoming.map((entry) => `${entry.name}: ${entry.congratulationDate}`),
    ].join('\n');
  };
}

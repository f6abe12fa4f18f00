import {
  type AddressBook,
  addContactCommand,
  changePhoneCommand,
  ContactRecord,
  contactLookupCommand,
  removePhoneCommand,
} from '@contact-desk/address-book-domain';
import { NotFoundError } from '@contact-desk/domain-kernel';
import type { CommandHandler } from './types.js';

export function requireContact(book: AddressBook, name: string): ContactRecord {
  const record = book.find(name);
  if (!record) {
    throw new NotFoundError('Contact', name);
  }
  return record;
}

export const addContact: CommandHandler = (args, book) => {
  const { name, phone } = addContactCommand(args);
  const existing = book.find(name);

  if (!existing) {
    // Build the record fully before it becomes visible in the book.
    const record = ContactRecord.create(name);
    if (phone !== null) record.addPhone(phone);
    book.addRecord(record);
    return phone !== null
      ? `Contact '${name}' created with phone ${phone}.`
      : `Contact '${name}' created without phone.`;
  }

  if (phone === null) {
    return `Contact '${name}' already exists.`;
  }
  existing.addPhone(phone);
  return `Phone ${phone} added to contact '${name}'.`;
};

export const changeContact: CommandHandler = (args, book) => {
  const { name, oldPhone, newPhone } = changePhoneCommand(args);
  const record = requireContact(book, name);

  if (!record.editPhone(oldPhone, newPhone)) {
    return `Error: Phone '${oldPhone}' not found.`;
  }
  return 'Contact updated.';
};

export const showPhone: CommandHandler = (args, book) => {
  const { name } = contactLookupCommand(args);
  const record = requireContact(book, name);

  if (record.phones.length === 0) {
    return `Contact '${name}' has no phones.`;
  }
  return `Phones of ${name}: ${record.phones.map((p) => p.value).join(', ')}`;
};

export const removePhone: CommandHandler = (args, book) => {
  const { name, phone } = removePhoneCommand(args);
  const record = requireContact(book, name);

  if (!record.removePhone(phone)) {
    return `Error: Phone '${phone}' not found.`;
  }
  return `Phone ${phone} removed from contact '${name}'.`;
};

export const deleteContact: CommandHandler = (args, book) => {
  const { name } = contactLookupCommand(args);
  if (!book.delete(name)) {
    throw new NotFoundError('Contact', name);
  }
  return `Contact '${name}' deleted.`;
};

export const showAll: CommandHandler = (_args, book) => {
  if (book.isEmpty()) {
    return 'No contacts found.';
  }
  return book
    .all()
    .map((record) => record.describe())
    .join('\n');
};

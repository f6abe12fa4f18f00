import type { AddressBook } from '@contact-desk/address-book-domain';

export type CommandHandler = (
  args: readonly string[],
  book: AddressBook,
) => string;

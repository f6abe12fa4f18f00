export {
  addBirthday,
  type BirthdaysHandlerOptions,
  createBirthdaysHandler,
  showBirthday,
} from './birthdays.js';
export {
  addContact,
  changeContact,
  deleteContact,
  removePhone,
  requireContact,
  showAll,
  showPhone,
} from './contacts.js';
export type { CommandHandler } from './types.js';

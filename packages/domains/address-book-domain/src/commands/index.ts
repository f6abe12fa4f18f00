export {
  type AddBirthdayCommand,
  AddBirthdayCommandSchema,
  addBirthdayCommand,
} from './add-birthday.js';
export {
  type AddContactCommand,
  AddContactCommandSchema,
  addContactCommand,
} from './add-contact.js';
export {
  type ChangePhoneCommand,
  ChangePhoneCommandSchema,
  changePhoneCommand,
} from './change-phone.js';
export {
  type ContactLookupCommand,
  ContactLookupCommandSchema,
  contactLookupCommand,
} from './contact-lookup.js';
export {
  type RemovePhoneCommand,
  RemovePhoneCommandSchema,
  removePhoneCommand,
} from './remove-phone.js';

export {
  ContactRecord,
  type ContactRecordProps,
  NO_BIRTHDAY,
} from './contact-record.js';

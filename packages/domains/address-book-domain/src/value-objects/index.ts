export {
  Birthday,
  BirthdaySchema,
  DATE_FORMAT,
  formatCalendarDate,
} from './birthday.js';
export {
  addDays,
  type CalendarDate,
  compareDates,
  daysBetween,
  fromDateParts,
  fromLocalDate,
  isLeapYear,
  weekdayIndex,
} from './calendar-date.js';
export { ContactName, ContactNameSchema } from './contact-name.js';
export { PHONE_LENGTH, Phone, PhoneSchema } from './phone.js';

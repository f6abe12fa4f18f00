export {
  congratulationDateFor,
  DEFAULT_WINDOW_DAYS,
  findUpcomingBirthdays,
  type UpcomingBirthday,
} from './upcoming-birthdays.js';

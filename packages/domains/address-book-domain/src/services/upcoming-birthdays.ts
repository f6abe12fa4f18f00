import type { ContactRecord } from '../entities/contact-record.js';
import { formatCalendarDate } from '../value-objects/birthday.js';
import {
  addDays,
  type CalendarDate,
  compareDates,
  daysBetween,
  fromLocalDate,
  weekdayIndex,
} from '../value-objects/calendar-date.js';

export const DEFAULT_WINDOW_DAYS = 7;

const DAYS_IN_WEEK = 7;
const FIRST_WEEKEND_DAY = 5; // Saturday; Sunday is 6

export interface UpcomingBirthday {
  name: string;
  /** DD.MM.YYYY */
  congratulationDate: string;
}

/**
 * Moves a Saturday or Sunday forward to the following Monday
 * (+2 and +1 days respectively); weekdays are returned unchanged.
 */
export function congratulationDateFor(date: CalendarDate): CalendarDate {
  const weekday = weekdayIndex(date);
  if (weekday >= FIRST_WEEKEND_DAY) {
    return addDays(date, DAYS_IN_WEEK - weekday);
  }
  return date;
}

/**
 * Contacts whose next birthday is between `today` and `today + windowDays`,
 * both ends inclusive, in the order `records` yields them.
 */
export function findUpcomingBirthdays(
  records: Iterable<ContactRecord>,
  today: Date,
  windowDays: number = DEFAULT_WINDOW_DAYS,
): UpcomingBirthday[] {
  const current = fromLocalDate(today);
  const upcoming: UpcomingBirthday[] = [];

  for (const record of records) {
    const birthday = record.birthday;
    if (!birthday) continue;

    let next = birthday.occurrenceIn(current.year);
    if (compareDates(next, current) < 0) {
      next = birthday.occurrenceIn(current.year + 1);
    }

    const delta = daysBetween(current, next);
    if (delta < 0 || delta > windowDays) continue;

    upcoming.push({
      name: record.name,
      congratulationDate: formatCalendarDate(congratulationDateFor(next)),
    });
  }

  return upcoming;
}

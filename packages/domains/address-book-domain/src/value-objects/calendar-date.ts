export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

const MS_PER_DAY = 86_400_000;

function toUtcDate({ year, month, day }: CalendarDate): Date {
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

function fromUtcDate(date: Date): CalendarDate {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Returns null unless the parts name a real day in years 1-9999. */
export function fromDateParts(
  year: number,
  month: number,
  day: number,
): CalendarDate | null {
  if (![year, month, day].every(Number.isInteger)) return null;
  if (year < 1 || year > 9999) return null;

  const candidate = { year, month, day };
  const roundTrip = fromUtcDate(toUtcDate(candidate));
  if (
    roundTrip.year !== year ||
    roundTrip.month !== month ||
    roundTrip.day !== day
  ) {
    return null;
  }
  return candidate;
}

/** Calendar fields of `date` in the local time zone; the time of day is dropped. */
export function fromLocalDate(date: Date): CalendarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  };
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round(
    (toUtcDate(to).getTime() - toUtcDate(from).getTime()) / MS_PER_DAY,
  );
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = toUtcDate(date);
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return fromUtcDate(shifted);
}

/** Monday = 0 ... Sunday = 6. */
export function weekdayIndex(date: CalendarDate): number {
  return (toUtcDate(date).getUTCDay() + 6) % 7;
}

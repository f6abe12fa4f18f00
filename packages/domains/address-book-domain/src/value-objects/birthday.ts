import { ValidationError } from '@contact-desk/domain-kernel';
import { z } from 'zod';
import { type CalendarDate, fromDateParts, isLeapYear } from './calendar-date.js';

export const DATE_FORMAT = 'DD.MM.YYYY';

const BIRTHDAY_MESSAGE = `Invalid date format. Use ${DATE_FORMAT}`;

export const BirthdaySchema = z
  .string()
  .regex(/^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, BIRTHDAY_MESSAGE)
  .transform((raw, ctx) => {
    const [day, month, year] = raw.split('.').map(Number);
    const date = fromDateParts(year, month, day);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: BIRTHDAY_MESSAGE });
      return z.NEVER;
    }
    return date;
  });

export function formatCalendarDate({ year, month, day }: CalendarDate): string {
  const dd = String(day).padStart(2, '0');
  const mm = String(month).padStart(2, '0');
  const yyyy = String(year).padStart(4, '0');
  return `${dd}.${mm}.${yyyy}`;
}

export class Birthday {
  private constructor(private readonly date: CalendarDate) {
    Object.freeze(this);
  }

  static create(raw: string): Birthday {
    const result = BirthdaySchema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError(BIRTHDAY_MESSAGE, { field: 'birthday', value: raw });
    }
    return new Birthday(result.data);
  }

  get year(): number {
    return this.date.year;
  }
  get month(): number {
    return this.date.month;
  }
  get day(): number {
    return this.date.day;
  }

  /**
   * The date this birthday falls on in `year`. A 29 February birthday is
   * observed on 28 February when `year` is not a leap year.
   */
  occurrenceIn(year: number): CalendarDate {
    if (this.month === 2 && this.day === 29 && !isLeapYear(year)) {
      return { year, month: 2, day: 28 };
    }
    return { year, month: this.month, day: this.day };
  }

  equals(other?: Birthday | null): boolean {
    return other != null && this.format() === other.format();
  }

  format(): string {
    return formatCalendarDate(this.date);
  }

  toString(): string {
    return this.format();
  }
}

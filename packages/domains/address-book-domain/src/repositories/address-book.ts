import type { ContactRecord } from '../entities/contact-record.js';
import {
  DEFAULT_WINDOW_DAYS,
  findUpcomingBirthdays,
  type UpcomingBirthday,
} from '../services/upcoming-birthdays.js';

/**
 * In-memory contact directory keyed by exact contact name.
 * Iteration follows insertion order; replacing a key keeps its position.
 */
export class AddressBook {
  private readonly records = new Map<string, ContactRecord>();

  /** Inserts `record`, replacing (never merging) any record with the same name. */
  addRecord(record: ContactRecord): void {
    this.records.set(record.name, record);
  }

  find(name: string): ContactRecord | null {
    return this.records.get(name) ?? null;
  }

  delete(name: string): boolean {
    return this.records.delete(name);
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  get size(): number {
    return this.records.size;
  }

  isEmpty(): boolean {
    return this.records.size === 0;
  }

  all(): ContactRecord[] {
    return [...this.records.values()];
  }

  [Symbol.iterator](): IterableIterator<ContactRecord> {
    return this.records.values();
  }

  upcomingBirthdays(
    today: Date,
    windowDays: number = DEFAULT_WINDOW_DAYS,
  ): UpcomingBirthday[] {
    return findUpcomingBirthdays(this.records.values(), today, windowDays);
  }
}

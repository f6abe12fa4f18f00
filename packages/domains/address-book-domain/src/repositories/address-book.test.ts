import { describe, expect, it } from 'vitest';
import { ContactRecord } from '../entities/contact-record.js';
import { AddressBook } from './address-book.js';

function recordWith(name: string, phones: string[] = [], birthday?: string) {
  const record = ContactRecord.create(name);
  for (const phone of phones) record.addPhone(phone);
  if (birthday) record.addBirthday(birthday);
  return record;
}

describe('AddressBook', () => {
  it('starts empty', () => {
    const book = new AddressBook();
    expect(book.isEmpty()).toBe(true);
    expect(book.size).toBe(0);
    expect(book.all()).toEqual([]);
  });

  it('finds records by exact name only', () => {
    const book = new AddressBook();
    const anna = recordWith('Anna');
    book.addRecord(anna);

    expect(book.find('Anna')).toBe(anna);
    expect(book.find('anna')).toBeNull();
    expect(book.find('Ann')).toBeNull();
    expect(book.has('Anna')).toBe(true);
  });

  it('replaces a record with the same name instead of merging', () => {
    const book = new AddressBook();
    book.addRecord(recordWith('Anna', ['0501234567'], '20.05.1990'));
    const replacement = recordWith('Anna', ['0677654321']);
    book.addRecord(replacement);

    const found = book.find('Anna');
    expect(found).toBe(replacement);
    expect(found?.phones.map((phone) => phone.value)).toEqual(['0677654321']);
    expect(found?.birthday).toBeNull();
    expect(book.size).toBe(1);
  });

  it('deletes a present record and reports it', () => {
    const book = new AddressBook();
    book.addRecord(recordWith('Anna'));
    book.addRecord(recordWith('Ben'));

    expect(book.delete('Anna')).toBe(true);
    expect(book.find('Anna')).toBeNull();
    expect(book.all().map((record) => record.name)).toEqual(['Ben']);
  });

  it('returns false and changes nothing when deleting an absent name', () => {
    const book = new AddressBook();
    book.addRecord(recordWith('Anna'));

    expect(book.delete('Ben')).toBe(false);
    expect(book.all().map((record) => record.name)).toEqual(['Anna']);
  });

  it('iterates in insertion order, keeping a replaced key in place', () => {
    const book = new AddressBook();
    book.addRecord(recordWith('Cara'));
    book.addRecord(recordWith('Anna'));
    book.addRecord(recordWith('Ben'));
    book.addRecord(recordWith('Cara', ['0501234567']));

    expect([...book].map((record) => record.name)).toEqual([
      'Cara',
      'Anna',
      'Ben',
    ]);
  });

  it('delegates the birthday window to its records', () => {
    const book = new AddressBook();
    book.addRecord(recordWith('Anna', [], '20.05.1990'));
    book.addRecord(recordWith('Ben'));

    expect(book.upcomingBirthdays(new Date(2024, 4, 17))).toEqual([
      { name: 'Anna', congratulationDate: '20.05.2024' },
    ]);
  });
});

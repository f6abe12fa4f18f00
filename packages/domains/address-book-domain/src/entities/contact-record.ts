import { DuplicatePhoneError, Entity } from '@contact-desk/domain-kernel';
import { Birthday } from '../value-objects/birthday.js';
import { ContactName } from '../value-objects/contact-name.js';
import { Phone } from '../value-objects/phone.js';

export const NO_BIRTHDAY = '—';

export interface ContactRecordProps {
  name: ContactName;
  phones: Phone[];
  birthday: Birthday | null;
}

/**
 * One contact: a fixed name, an ordered list of distinct phones and an
 * optional birthday. The name doubles as the entity id and the address book key.
 */
export class ContactRecord extends Entity<ContactRecordProps> {
  private constructor(props: ContactRecordProps) {
    super(props.name.value, props);
  }

  // ---- Factory methods ----

  static create(name: string): ContactRecord {
    return new ContactRecord({
      name: ContactName.create(name),
      phones: [],
      birthday: null,
    });
  }

  // ---- Accessors ----

  get name(): string {
    return this.props.name.value;
  }
  get phones(): readonly Phone[] {
    return [...this.props.phones];
  }
  get birthday(): Birthday | null {
    return this.props.birthday;
  }

  // ---- Domain methods ----

  addPhone(raw: string): void {
    const phone = Phone.create(raw);
    if (this.findPhone(phone.value)) {
      throw new DuplicatePhoneError(phone.value);
    }
    this.props.phones.push(phone);
  }

  findPhone(raw: string): Phone | null {
    return this.props.phones.find((phone) => phone.value === raw) ?? null;
  }

  removePhone(raw: string): boolean {
    const index = this.indexOfPhone(raw);
    if (index === -1) return false;
    this.props.phones.splice(index, 1);
    return true;
  }

  /**
   * Replaces `oldRaw` in place. Returns false, changing nothing, when
   * `oldRaw` is absent; an invalid `newRaw` throws before anything changes.
   */
  editPhone(oldRaw: string, newRaw: string): boolean {
    const index = this.indexOfPhone(oldRaw);
    if (index === -1) return false;

    const replacement = Phone.create(newRaw);
    const clash = this.indexOfPhone(replacement.value);
    if (clash !== -1 && clash !== index) {
      throw new DuplicatePhoneError(replacement.value);
    }
    this.props.phones[index] = replacement;
    return true;
  }

  addBirthday(raw: string): void {
    this.props.birthday = Birthday.create(raw);
  }

  describe(): string {
    const phones = this.props.phones.map((phone) => phone.value).join('; ');
    const birthday = this.props.birthday?.format() ?? NO_BIRTHDAY;
    return `${this.name}: phones=[${phones}], birthday=${birthday}`;
  }

  toString(): string {
    return this.describe();
  }

  private indexOfPhone(raw: string): number {
    return this.props.phones.findIndex((phone) => phone.value === raw);
  }
}

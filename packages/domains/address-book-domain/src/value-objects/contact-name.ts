import { ValidationError } from '@contact-desk/domain-kernel';
import { z } from 'zod';

export const ContactNameSchema = z.string().min(1, 'Name must not be empty.');

export class ContactName {
  private constructor(readonly value: string) {
    Object.freeze(this);
  }

  static create(raw: string): ContactName {
    const result = ContactNameSchema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError(result.error.issues[0].message, {
        field: 'name',
      });
    }
    return new ContactName(result.data);
  }

  equals(other?: ContactName | null): boolean {
    return other != null && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }
}

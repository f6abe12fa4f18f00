import { ValidationError } from '@contact-desk/domain-kernel';
import { z } from 'zod';

export const PHONE_LENGTH = 10;

const NOT_A_STRING = 'Phone must be a string.';

export const PhoneSchema = z
  .string({ invalid_type_error: NOT_A_STRING, required_error: NOT_A_STRING })
  .regex(/^\d+$/, 'Phone must contain only digits.')
  .length(PHONE_LENGTH, `Phone must be exactly ${PHONE_LENGTH} digits.`);

export class Phone {
  private constructor(readonly value: string) {
    Object.freeze(this);
  }

  static create(raw: unknown): Phone {
    const result = PhoneSchema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError(result.error.issues[0].message, {
        field: 'phone',
      });
    }
    return new Phone(result.data);
  }

  equals(other?: Phone | null): boolean {
    return other != null && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }
}

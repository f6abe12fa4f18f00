import { describe, expect, it } from 'vitest';
import {
  ConflictError,
  DomainError,
  DuplicatePhoneError,
  NotFoundError,
  ValidationError,
} from './domain-error.js';

describe('DomainError hierarchy', () => {
  it('builds a not-found message from entity and id', () => {
    const err = new NotFoundError('Contact', 'Bob');
    expect(err.message).toBe("Contact 'Bob' not found");
    expect(err.code).toBe('NOT_FOUND');
    expect(err.statusCode).toBe(404);
    expect(err.details).toEqual({ entity: 'Contact', id: 'Bob' });
    expect(err).toBeInstanceOf(DomainError);
  });

  it('carries validation details', () => {
    const err = new ValidationError('bad input', { field: 'phone' });
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.statusCode).toBe(400);
    expect(err.details).toEqual({ field: 'phone' });
    expect(err.name).toBe('ValidationError');
  });

  it('treats a duplicate phone as a conflict', () => {
    const err = new DuplicatePhoneError('0501234567');
    expect(err).toBeInstanceOf(ConflictError);
    expect(err).toBeInstanceOf(DomainError);
    expect(err.code).toBe('DUPLICATE_PHONE');
    expect(err.statusCode).toBe(409);
    expect(err.phone).toBe('0501234567');
    expect(err.message).toBe('This phone is already added.');
  });
});

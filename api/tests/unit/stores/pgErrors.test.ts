import { describe, it, expect } from 'vitest';
import { isForeignKeyViolation, isUniqueViolation } from '@/stores/pgErrors';

describe('postgres error classification', () => {
  it('recognises a unique violation by SQLSTATE', () => {
    expect(isUniqueViolation({ code: '23505', constraint_name: 'users_email_key' })).toBe(true);
    expect(isUniqueViolation({ code: '23503' })).toBe(false);
  });

  it('looks through wrapped errors', () => {
    const wrapped = new Error('Failed query', { cause: { code: '23505' } });
    expect(isUniqueViolation(wrapped)).toBe(true);
  });

  it('recognises a foreign key violation', () => {
    expect(isForeignKeyViolation({ code: '23503' })).toBe(true);
    expect(isForeignKeyViolation({ code: '23505' })).toBe(false);
  });

  it('ignores values that are not postgres errors', () => {
    expect(isUniqueViolation(null)).toBe(false);
    expect(isUniqueViolation('23505')).toBe(false);
    expect(isUniqueViolation(new Error('boom'))).toBe(false);
    expect(isUniqueViolation({ code: 'ECONNREFUSED' })).toBe(false);
  });
});

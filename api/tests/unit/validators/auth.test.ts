import { describe, it, expect } from 'vitest';
import { loginFormSchema, registerFormSchema } from '@/validators/auth';

describe('registerFormSchema', () => {
  it('trims the email and name but not the password', () => {
    expect(
      registerFormSchema.parse({ email: ' a@x.com ', password: ' pw1 ', name: ' Alice ' })
    ).toEqual({ email: 'a@x.com', password: ' pw1 ', name: 'Alice' });
  });

  it('reports each missing field', () => {
    const result = registerFormSchema.safeParse({});
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.message)).toEqual([
      'Email is required',
      'Password is required',
      'Name is required',
    ]);
  });

  it('rejects a malformed email', () => {
    const result = registerFormSchema.safeParse({ email: 'alice', password: 'pw1', name: 'Alice' });
    expect(result.error?.issues[0]?.message).toBe('Enter a valid email address');
  });
});

describe('loginFormSchema', () => {
  it('accepts an email and password', () => {
    expect(loginFormSchema.parse({ email: 'a@x.com', password: 'pw1' })).toEqual({
      email: 'a@x.com',
      password: 'pw1',
    });
  });

  it('rejects an empty password', () => {
    const result = loginFormSchema.safeParse({ email: 'a@x.com', password: '' });
    expect(result.error?.issues[0]?.message).toBe('Password is required');
  });
});

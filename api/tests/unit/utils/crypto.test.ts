import { describe, it, expect } from 'vitest';
import {
  constantTimeCompare,
  generateSalt,
  generateSessionToken,
  hashPassword,
  hashSessionToken,
  verifyPassword,
} from '@/utils/crypto';

describe('crypto utils', () => {
  describe('hashPassword', () => {
    it('writes pbkdf2:sha256 with the iteration count, an 8-char salt and a hex digest', async () => {
      const hash = await hashPassword('pw1', { iterations: 1000 });
      expect(hash).toMatch(/^pbkdf2:sha256:1000\$[A-Za-z0-9]{8}\$[0-9a-f]{64}$/);
    });

    it('salts every hash', async () => {
      const first = await hashPassword('pw1', { iterations: 1000 });
      const second = await hashPassword('pw1', { iterations: 1000 });
      expect(first).not.toBe(second);
    });
  });

  describe('verifyPassword', () => {
    it('accepts the password a hash was made from', async () => {
      const hash = await hashPassword('correct horse', { iterations: 1000 });
      expect(await verifyPassword(hash, 'correct horse')).toBe(true);
    });

    it('rejects any other password', async () => {
      const hash = await hashPassword('correct horse', { iterations: 1000 });
      expect(await verifyPassword(hash, 'correct-horse')).toBe(false);
      expect(await verifyPassword(hash, '')).toBe(false);
    });

    it('verifies a hash produced elsewhere in the same format', async () => {
      // PBKDF2-HMAC-SHA256("passwd", "salt", 1 iteration), first 32 bytes
      const stored =
        'pbkdf2:sha256:1$salt$55ac046e56e3089fec1691c22544b605f94185216dde0465e68b9d57c20dacbc';
      expect(await verifyPassword(stored, 'passwd')).toBe(true);
      expect(await verifyPassword(stored, 'password')).toBe(false);
    });

    it('never verifies malformed or unsupported hashes', async () => {
      expect(await verifyPassword('not-a-hash', 'pw')).toBe(false);
      expect(await verifyPassword('md5$salt$abc', 'pw')).toBe(false);
      expect(await verifyPassword('pbkdf2:sha1:1000$salt$abc', 'pw')).toBe(false);
      expect(await verifyPassword('pbkdf2:sha256:0$salt$abc', 'pw')).toBe(false);
      expect(await verifyPassword('pbkdf2:sha256:abc$salt$abc', 'pw')).toBe(false);
    });

    it('rejects an iteration field with trailing characters', async () => {
      const digest = '55ac046e56e3089fec1691c22544b605f94185216dde0465e68b9d57c20dacbc';
      expect(await verifyPassword(`pbkdf2:sha256:1abc$salt$${digest}`, 'passwd')).toBe(false);
      expect(await verifyPassword(`pbkdf2:sha256:-1$salt$${digest}`, 'passwd')).toBe(false);
    });
  });

  describe('generateSalt', () => {
    it('defaults to 8 alphanumeric characters', () => {
      expect(generateSalt()).toMatch(/^[A-Za-z0-9]{8}$/);
    });

    it('honours a custom length', () => {
      expect(generateSalt(16)).toHaveLength(16);
    });
  });

  describe('session tokens', () => {
    it('generates 64 hex chars', () => {
      expect(generateSessionToken()).toMatch(/^[0-9a-f]{64}$/);
    });

    it('hashes with SHA-256', () => {
      expect(hashSessionToken('abc')).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
      );
    });
  });

  describe('constantTimeCompare', () => {
    it('compares equal and unequal strings', () => {
      expect(constantTimeCompare('abc', 'abc')).toBe(true);
      expect(constantTimeCompare('abc', 'abd')).toBe(false);
      expect(constantTimeCompare('abc', 'abcd')).toBe(false);
    });
  });
});

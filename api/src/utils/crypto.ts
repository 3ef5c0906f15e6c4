/**
 * Cryptographic Utilities
 *
 * Password hashing, session token generation and hashing, and
 * constant-time comparison.
 */

import crypto from 'crypto';
import { promisify } from 'util';
import { logger } from '@/utils/logger';

const pbkdf2 = promisify(crypto.pbkdf2);

const SALT_CHARS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

// Iteration count assumed for stored hashes written as "pbkdf2:sha256" with no count
const LEGACY_PBKDF2_ITERATIONS = 260_000;

const SUPPORTED_DIGESTS = new Set(['sha256', 'sha512']);

export const DEFAULT_SALT_LENGTH = 8;

export interface PasswordHashOptions {
  iterations: number;
  saltLength?: number;
}

/**
 * Generate a random alphanumeric salt
 */
export function generateSalt(length: number = DEFAULT_SALT_LENGTH): string {
  let salt = '';
  for (let i = 0; i < length; i++) {
    salt += SALT_CHARS[crypto.randomInt(SALT_CHARS.length)];
  }
  return salt;
}

async function pbkdf2Hex(
  password: string,
  salt: string,
  iterations: number,
  digest: string
): Promise<string> {
  const keyLength = digest === 'sha512' ? 64 : 32;
  const derived = await pbkdf2(Buffer.from(password, 'utf8'), Buffer.from(salt, 'utf8'), iterations, keyLength, digest);
  return derived.toString('hex');
}

/**
 * Hash a password with PBKDF2-HMAC-SHA256
 *
 * Format: pbkdf2:sha256:{iterations}${salt}${hex digest}
 * The salt is used as UTF-8 text, so hashes written by other
 * implementations of the same format verify unchanged.
 */
export async function hashPassword(password: string, options: PasswordHashOptions): Promise<string> {
  const salt = generateSalt(options.saltLength ?? DEFAULT_SALT_LENGTH);
  const hex = await pbkdf2Hex(password, salt, options.iterations, 'sha256');
  return `pbkdf2:sha256:${options.iterations}$${salt}$${hex}`;
}

/**
 * Verify a password against a stored hash
 *
 * The digest and iteration count are read from the stored value.
 * Malformed or unsupported hashes never verify.
 */
export async function verifyPassword(storedHash: string, password: string): Promise<boolean> {
  const [method, salt, expected] = storedHash.split('$');
  if (!method || salt === undefined || !expected) {
    return false;
  }

  const [scheme, digest, rawIterations] = method.split(':');
  if (scheme !== 'pbkdf2' || !digest || !SUPPORTED_DIGESTS.has(digest)) {
    logger.warn('Unsupported password hash method', { method });
    return false;
  }

  if (rawIterations !== undefined && !/^\d+$/.test(rawIterations)) {
    return false;
  }
  const iterations = rawIterations ? Number.parseInt(rawIterations, 10) : LEGACY_PBKDF2_ITERATIONS;
  if (!Number.isSafeInteger(iterations) || iterations < 1) {
    return false;
  }

  const actual = await pbkdf2Hex(password, salt, iterations, digest);
  return constantTimeCompare(actual, expected);
}

/**
 * Generate a secure session token
 *
 * @returns Random session token (64 hex chars)
 */
export function generateSessionToken(): string {
  return crypto.randomBytes(32).toString('hex');
}

/**
 * Hash a session token with SHA-256
 *
 * Only the hash is stored in the sessions table.
 *
 * @returns SHA-256 hash (hex string, 64 chars)
 */
export function hashSessionToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

/**
 * Constant-time string comparison
 */
export function constantTimeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  if (bufA.length !== bufB.length) {
    crypto.timingSafeEqual(bufA, bufA);
    return false;
  }

  return crypto.timingSafeEqual(bufA, bufB);
}

/**
 * Authentication Service
 *
 * Business logic for authentication operations:
 * - Registration with salted PBKDF2 password hashes
 * - Email/password login creating a server-side session
 * - Logout
 * - Resolving the principal behind a session token
 */

import type { IdentityStore, SessionStore } from '@/stores';
import { ANONYMOUS, type Principal, type User } from '@/types/blog';
import { DuplicateEmailError, UnauthenticatedError, UnknownEmailError, WrongPasswordError } from '@/errors/blog';
import { generateSessionToken, hashPassword, hashSessionToken, verifyPassword } from '@/utils/crypto';
import { logger } from '@/utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AuthServiceDeps {
  identity: IdentityStore;
  sessions: SessionStore;
  passwordHashIterations: number;
  sessionTtlDays: number;
  now?: () => Date;
}

export interface Registration {
  email: string;
  password: string;
  name: string;
}

export interface Credentials {
  email: string;
  password: string;
}

/**
 * Session established by a successful login
 */
export interface LoginResult {
  user: User;
  token: string; // Raw token for the cookie; only its hash is stored
  expiresAt: Date;
}

export function createAuthService(deps: AuthServiceDeps) {
  const now = deps.now ?? (() => new Date());

  /**
   * Create an account
   *
   * The new user is not logged in; they sign in through the login form.
   *
   * @throws DuplicateEmailError if the email is already registered
   */
  async function register(input: Registration): Promise<User> {
    const existing = await deps.identity.findByEmail(input.email);
    if (existing) {
      logger.info('Registration rejected: email already registered', { userId: existing.id });
      throw new DuplicateEmailError(input.email);
    }

    const passwordHash = await hashPassword(input.password, {
      iterations: deps.passwordHashIterations,
    });

    // A concurrent registration can still win the race; the store's
    // unique constraint turns that into DuplicateEmailError as well.
    const user = await deps.identity.create({
      email: input.email,
      passwordHash,
      name: input.name,
    });

    logger.info('User registered', { userId: user.id });
    return user;
  }

  /**
   * Check credentials and open a session
   *
   * A session the browser already holds is closed once the new one is open.
   *
   * @throws UnknownEmailError, WrongPasswordError
   */
  async function login(input: Credentials, previousToken?: string): Promise<LoginResult> {
    const user = await deps.identity.findByEmail(input.email);
    if (!user) {
      logger.info('Login failed: unknown email');
      throw new UnknownEmailError();
    }

    const valid = await verifyPassword(user.passwordHash, input.password);
    if (!valid) {
      logger.info('Login failed: wrong password', { userId: user.id });
      throw new WrongPasswordError();
    }

    const token = generateSessionToken();
    const expiresAt = new Date(now().getTime() + deps.sessionTtlDays * DAY_MS);
    await deps.sessions.create({
      userId: user.id,
      tokenHash: hashSessionToken(token),
      expiresAt,
    });
    if (previousToken) {
      await deps.sessions.delete(hashSessionToken(previousToken));
    }

    logger.info('User logged in', { userId: user.id });
    return { user, token, expiresAt };
  }

  /**
   * @throws UnauthenticatedError when nobody is logged in
   */
  async function logout(principal: Principal, token: string | undefined): Promise<void> {
    if (principal.kind === 'anonymous') {
      throw new UnauthenticatedError('You need to login first.');
    }
    if (token) {
      await deps.sessions.delete(hashSessionToken(token));
    }
    logger.info('User logged out', { userId: principal.user.id });
  }

  /**
   * Resolve the principal behind a session token
   *
   * Missing, unknown and expired tokens all resolve to anonymous.
   */
  async function currentPrincipal(token: string | undefined): Promise<Principal> {
    if (!token) {
      return ANONYMOUS;
    }

    const session = await deps.sessions.findActive(hashSessionToken(token), now());
    if (!session) {
      return ANONYMOUS;
    }

    const user = await deps.identity.findById(session.userId);
    return user ? { kind: 'user', user } : ANONYMOUS;
  }

  async function purgeExpiredSessions(): Promise<number> {
    const removed = await deps.sessions.deleteExpired(now());
    if (removed > 0) {
      logger.info('Expired sessions removed', { count: removed });
    }
    return removed;
  }

  return { register, login, logout, currentPrincipal, purgeExpiredSessions };
}

export type AuthService = ReturnType<typeof createAuthService>;

/**
 * Blog Errors
 *
 * Thrown by stores and services, mapped to HTML responses by the
 * onError handler (see middleware/errorHandler.ts) or caught by a route
 * that shows the message inline on its form.
 */

export type BlogErrorCode =
  | 'DUPLICATE_EMAIL'
  | 'DUPLICATE_TITLE'
  | 'UNKNOWN_EMAIL'
  | 'WRONG_PASSWORD'
  | 'UNKNOWN_AUTHOR'
  | 'UNAUTHENTICATED'
  | 'FORBIDDEN'
  | 'NOT_FOUND';

export class BlogError extends Error {
  constructor(
    readonly code: BlogErrorCode,
    readonly status: 401 | 403 | 404 | 409 | 422,
    message: string,
  ) {
    super(message);
    this.name = 'BlogError';
  }
}

export class DuplicateEmailError extends BlogError {
  constructor(readonly email: string) {
    super('DUPLICATE_EMAIL', 409, 'This email has been registered. Login with the email.');
    this.name = 'DuplicateEmailError';
  }
}

export class DuplicateTitleError extends BlogError {
  constructor(readonly title: string) {
    super('DUPLICATE_TITLE', 409, 'A post with this title already exists.');
    this.name = 'DuplicateTitleError';
  }
}

export class UnknownEmailError extends BlogError {
  constructor() {
    super('UNKNOWN_EMAIL', 401, 'This email does not exist. Please try again.');
    this.name = 'UnknownEmailError';
  }
}

export class WrongPasswordError extends BlogError {
  constructor() {
    super('WRONG_PASSWORD', 401, 'Password incorrect. Please try again.');
    this.name = 'WrongPasswordError';
  }
}

export class UnknownAuthorError extends BlogError {
  constructor(readonly email: string) {
    super('UNKNOWN_AUTHOR', 422, 'No account is registered with that email.');
    this.name = 'UnknownAuthorError';
  }
}

export class UnauthenticatedError extends BlogError {
  constructor(message = 'You need to login or register first.') {
    super('UNAUTHENTICATED', 401, message);
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends BlogError {
  constructor() {
    super('FORBIDDEN', 403, 'Access denied');
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends BlogError {
  constructor(readonly resource: 'post' | 'user', readonly id: number) {
    super('NOT_FOUND', 404, `NOT_FOUND: ${resource} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * Startup misconfiguration. Never caught by the HTTP layer.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR' as const;
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

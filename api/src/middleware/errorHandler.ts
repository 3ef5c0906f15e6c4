/**
 * Error Handler
 *
 * Maps errors that escape route handlers and middleware to HTML responses:
 * - UnauthenticatedError → redirect to /login with the message as a notice
 * - ForbiddenError → 403 "Access denied" page
 * - NotFoundError → 404 page
 * - other BlogErrors → page with the error's own status and message
 * - ZodError → 422
 * - HTTPException (e.g. the CSRF origin check) → its own response
 * - anything else → logged, 500 page
 */

import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { HonoEnv } from '@/types/hono';
import { BlogError, ForbiddenError, NotFoundError, UnauthenticatedError } from '@/errors/blog';
import { errorPage } from '@/views/pages';
import { pageContext } from '@/views/layout';
import { setFlash } from '@/utils/flash';
import { logger } from '@/utils/logger';

export interface ErrorHandlerOptions {
  // Show internal error messages (development and test only)
  verbose: boolean;
}

function notFoundPage(c: Context<HonoEnv>) {
  return c.html(errorPage(pageContext(c), 'Not Found', 'The page you asked for does not exist.'), 404);
}

export const notFoundHandler: NotFoundHandler<HonoEnv> = (c) => notFoundPage(c);

export function createErrorHandler(options: ErrorHandlerOptions): ErrorHandler<HonoEnv> {
  return (error, c) => {
    if (error instanceof UnauthenticatedError) {
      setFlash(c, error.message);
      return c.redirect('/login');
    }

    if (error instanceof ForbiddenError) {
      return c.html(
        errorPage(pageContext(c), 'Access denied', 'This page is only available to the blog administrator.'),
        403
      );
    }

    if (error instanceof NotFoundError) {
      return notFoundPage(c);
    }

    if (error instanceof BlogError) {
      return c.html(errorPage(pageContext(c), 'Request failed', error.message), error.status);
    }

    if (error instanceof ZodError) {
      return c.html(errorPage(pageContext(c), 'Invalid request', 'The submitted data was not valid.'), 422);
    }

    if (error instanceof HTTPException) {
      return error.getResponse();
    }

    logger.error('Unhandled error', {
      error: String(error),
      stack: error.stack,
      cause: error.cause ? String(error.cause) : undefined,
      path: c.req.path,
      method: c.req.method,
    });

    return c.html(
      errorPage(
        pageContext(c),
        'Something went wrong',
        options.verbose ? error.message : 'An internal error occurred'
      ),
      500
    );
  };
}

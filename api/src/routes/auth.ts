/**
 * Authentication Routes
 *
 * Routes:
 * - GET  /register
 * - POST /register
 * - GET  /login
 * - POST /login
 * - GET  /logout
 */

import { Hono } from 'hono';
import type { HonoEnv } from '@/types/hono';
import type { AuthService } from '@/services/auth.service';
import { DuplicateEmailError, UnknownEmailError, WrongPasswordError } from '@/errors/blog';
import { endSession, requireAuth, startSession, type SessionCookieOptions } from '@/middleware/auth';
import { loginFormSchema, registerFormSchema } from '@/validators/auth';
import { parseForm } from '@/validators/form';
import { loginPage, registerPage } from '@/views/auth';
import { pageContext, principalOf } from '@/views/layout';
import { setFlash } from '@/utils/flash';

export interface AuthRoutesDeps {
  auth: AuthService;
  cookies: SessionCookieOptions;
}

export function createAuthRoutes({ auth, cookies }: AuthRoutesDeps) {
  const routes = new Hono<HonoEnv>();

  routes.get('/register', (c) => c.html(registerPage(pageContext(c))));

  /**
   * POST /register
   *
   * Creates the account and returns to the listing. The new user still has
   * to log in.
   */
  routes.post('/register', async (c) => {
    const form = await parseForm(c, registerFormSchema);
    if (!form.success) {
      return c.html(registerPage(pageContext(c), form), 422);
    }

    try {
      await auth.register(form.data);
    } catch (error) {
      if (error instanceof DuplicateEmailError) {
        setFlash(c, error.message);
        return c.redirect('/login');
      }
      throw error;
    }

    return c.redirect('/');
  });

  routes.get('/login', (c) => c.html(loginPage(pageContext(c))));

  /**
   * POST /login
   *
   * An unknown email goes back to a fresh login form with a notice; a wrong
   * password keeps the submitted email on the form. Logging in again replaces
   * the current session.
   */
  routes.post('/login', async (c) => {
    const form = await parseForm(c, loginFormSchema);
    if (!form.success) {
      return c.html(loginPage(pageContext(c), form), 422);
    }

    try {
      const session = await auth.login(form.data, c.get('sessionToken'));
      await startSession(c, session, cookies);
      return c.redirect('/');
    } catch (error) {
      if (error instanceof UnknownEmailError) {
        setFlash(c, error.message);
        return c.redirect('/login');
      }
      if (error instanceof WrongPasswordError) {
        return c.html(
          loginPage(pageContext(c), { values: { email: form.data.email }, notice: error.message }),
          error.status
        );
      }
      throw error;
    }
  });

  routes.get('/logout', requireAuth, async (c) => {
    await auth.logout(principalOf(c), c.get('sessionToken'));
    endSession(c);
    return c.redirect('/');
  });

  return routes;
}

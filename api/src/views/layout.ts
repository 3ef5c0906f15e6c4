/**
 * Page Layout
 *
 * Shared chrome for every server-rendered page: navigation that depends on
 * the principal, the one-shot flash notice, and the footer.
 */

import type { Context } from 'hono';
import { html } from 'hono/html';
import type { HonoEnv } from '@/types/hono';
import { ANONYMOUS, type Principal } from '@/types/blog';
import { isAdmin } from '@/services/accessControl';
import { takeFlash } from '@/utils/flash';
import type { FieldErrors, FormValues } from '@/validators/form';

export type Html = ReturnType<typeof html>;

export interface PageContext {
  principal: Principal;
  isAdmin: boolean;
  flash?: string;
}

export function principalOf(c: Context<HonoEnv>): Principal {
  return c.get('principal') ?? ANONYMOUS;
}

/**
 * Collect what the layout needs from the request. Consumes the flash notice.
 */
export function pageContext(c: Context<HonoEnv>): PageContext {
  const principal = principalOf(c);
  return {
    principal,
    isAdmin: isAdmin(principal),
    flash: takeFlash(c),
  };
}

function navigation(principal: Principal): Html {
  const account =
    principal.kind === 'user'
      ? html`<li class="nav-item"><a class="nav-link" href="/logout">Log Out</a></li>`
      : html`<li class="nav-item"><a class="nav-link" href="/login">Login</a></li>
          <li class="nav-item"><a class="nav-link" href="/register">Register</a></li>`;

  return html`<nav class="navbar navbar-expand-lg navbar-light">
      <div class="container">
        <a class="navbar-brand" href="/">Blog</a>
        <ul class="navbar-nav ml-auto">
          <li class="nav-item"><a class="nav-link" href="/">Home</a></li>
          ${account}
          <li class="nav-item"><a class="nav-link" href="/about">About</a></li>
          <li class="nav-item"><a class="nav-link" href="/contact">Contact</a></li>
        </ul>
      </div>
    </nav>`;
}

export function layout(ctx: PageContext, title: string, content: Html): Html {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${title}</title>
    <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/bootstrap@4.6.2/dist/css/bootstrap.min.css">
  </head>
  <body>
    ${navigation(ctx.principal)}
    <main class="container">
      ${ctx.flash ? html`<p class="flash alert alert-info">${ctx.flash}</p>` : ''}
      ${content}
    </main>
    <footer class="container"><p class="copyright text-muted">Copyright &copy; ${new Date().getFullYear()}</p></footer>
  </body>
</html>`;
}

export interface FormState {
  values?: FormValues;
  errors?: FieldErrors;
  notice?: string;
}

/**
 * Labelled input with its validation message
 */
export function field(
  name: string,
  label: string,
  state: FormState,
  options: { type?: string; value?: string; multiline?: boolean } = {}
): Html {
  const value = options.value ?? state.values?.[name] ?? '';
  const error = state.errors?.[name];
  const control = options.multiline
    ? html`<textarea class="form-control" id="${name}" name="${name}" rows="8">${value}</textarea>`
    : html`<input class="form-control" id="${name}" name="${name}" type="${options.type ?? 'text'}" value="${value}">`;

  return html`<div class="form-group">
      <label for="${name}">${label}</label>
      ${control}
      ${error ? html`<small class="field-error text-danger">${error}</small>` : ''}
    </div>`;
}

export function notice(state: FormState): Html | string {
  return state.notice ? html`<p class="form-notice alert alert-warning">${state.notice}</p>` : '';
}

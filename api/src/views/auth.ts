import { html } from 'hono/html';
import { field, layout, notice, type FormState, type Html, type PageContext } from './layout';

export function registerPage(ctx: PageContext, form: FormState = {}): Html {
  return layout(
    ctx,
    'Register',
    html`<h1>Register</h1>
      <p class="subheading">Start contributing to the blog!</p>
      <form class="register-form" method="post" action="/register">
        ${notice(form)}
        ${field('email', 'Email', form, { type: 'email' })}
        ${field('password', 'Password', form, { type: 'password', value: '' })}
        ${field('name', 'Name', form)}
        <button class="btn btn-primary" type="submit">Sign Me Up!</button>
      </form>`
  );
}

export function loginPage(ctx: PageContext, form: FormState = {}): Html {
  return layout(
    ctx,
    'Log In',
    html`<h1>Log In</h1>
      <p class="subheading">Welcome back!</p>
      <form class="login-form" method="post" action="/login">
        ${notice(form)}
        ${field('email', 'Email', form, { type: 'email' })}
        ${field('password', 'Password', form, { type: 'password', value: '' })}
        <button class="btn btn-primary" type="submit">Let Me In!</button>
      </form>`
  );
}

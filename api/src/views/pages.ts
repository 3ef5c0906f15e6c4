import { html } from 'hono/html';
import { layout, type Html, type PageContext } from './layout';

export function aboutPage(ctx: PageContext): Html {
  return layout(
    ctx,
    'About Me',
    html`<h1>About Me</h1>
      <span class="subheading">This is what I do.</span>
      <p>I write about the things I build and the things I break while building them.
        Posts go up when there is something worth saying.</p>`
  );
}

export function contactPage(ctx: PageContext): Html {
  return layout(
    ctx,
    'Contact Me',
    html`<h1>Contact Me</h1>
      <span class="subheading">Have questions? I have answers.</span>
      <p>Leave a comment under any post, or reach out by email and I will get back to you
        as soon as I can.</p>`
  );
}

export function errorPage(ctx: PageContext, title: string, message: string): Html {
  return layout(
    ctx,
    title,
    html`<h1 class="error-title">${title}</h1>
      <p class="error-message">${message}</p>
      <a href="/">Back to all posts</a>`
  );
}

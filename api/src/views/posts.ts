import { html, raw } from 'hono/html';
import type { CommentView, PostView } from '@/types/blog';
import type { PostPage } from '@/services/content.service';
import { gravatarUrl } from '@/utils/gravatar';
import { field, layout, notice, type FormState, type Html, type PageContext } from './layout';

function postPreview(ctx: PageContext, post: PostView): Html {
  return html`<div class="post-preview">
      <a href="/post/${post.id}">
        <h2 class="post-title">${post.title}</h2>
        <h3 class="post-subtitle">${post.subtitle}</h3>
      </a>
      <p class="post-meta">Posted by ${post.authorName} on ${post.date}${
        ctx.isAdmin ? html` <a class="delete-post" href="/delete/${post.id}">✘</a>` : ''
      }</p>
    </div>
    <hr>`;
}

export function indexPage(ctx: PageContext, posts: PostView[]): Html {
  return layout(
    ctx,
    'Blog',
    html`<header class="masthead"><h1>Blog</h1><span class="subheading">A collection of random musings.</span></header>
      <section class="posts">
        ${posts.length > 0 ? posts.map((post) => postPreview(ctx, post)) : html`<p class="empty">No posts yet.</p>`}
      </section>
      ${ctx.isAdmin ? html`<a class="btn btn-primary new-post" href="/new-post">Create New Post</a>` : ''}`
  );
}

function commentItem(comment: CommentView): Html {
  return html`<li class="comment">
      <img class="commenter-image" src="${gravatarUrl(comment.authorEmail)}" alt="">
      <div class="comment-text">${comment.text}</div>
      <span class="comment-author">${comment.authorName}</span>
    </li>`;
}

export function postPage(ctx: PageContext, page: PostPage, form: FormState = {}): Html {
  const { post, comments } = page;

  return layout(
    ctx,
    post.title,
    html`<header class="post-heading">
        <img class="post-image" src="${post.imageUrl}" alt="">
        <h1 class="post-title">${post.title}</h1>
        <h2 class="subheading">${post.subtitle}</h2>
        <span class="meta">Posted by ${post.authorName} on ${post.date}</span>
      </header>
      <article class="post-body">${raw(post.body)}</article>
      ${ctx.isAdmin ? html`<a class="btn btn-primary edit-post" href="/edit-post/${post.id}">Edit Post</a>` : ''}
      <form class="comment-form" method="post" action="/post/${post.id}">
        ${notice(form)}
        ${field('comment', 'Comment', form, { multiline: true })}
        <button class="btn btn-primary" type="submit">Submit Comment</button>
      </form>
      <ul class="comments">
        ${comments.map(commentItem)}
      </ul>`
  );
}

export interface PostFormView {
  mode: 'create' | 'edit';
  postId?: number;
}

export function postFormPage(ctx: PageContext, view: PostFormView, form: FormState): Html {
  const heading = view.mode === 'edit' ? 'Edit Post' : 'New Post';
  const action = view.mode === 'edit' ? `/edit-post/${view.postId}` : '/new-post';

  return layout(
    ctx,
    heading,
    html`<h1>${heading}</h1>
      <form class="post-form" method="post" action="${action}">
        ${notice(form)}
        ${field('title', 'Blog Post Title', form)}
        ${field('subtitle', 'Subtitle', form)}
        ${view.mode === 'edit' ? field('author', 'Author Email', form, { type: 'email' }) : ''}
        ${field('img_url', 'Blog Image URL', form, { type: 'url' })}
        ${field('body', 'Blog Content', form, { multiline: true })}
        <button class="btn btn-primary" type="submit">Submit Post</button>
      </form>`
  );
}

/**
 * Post Routes
 *
 * Routes:
 * - GET  /                 all posts
 * - GET  /post/:id         one post with its comments
 * - POST /post/:id         add a comment (logged-in users)
 * - GET  /new-post         (admin) new post form
 * - POST /new-post         (admin) create post
 * - GET  /edit-post/:id    (admin) edit form, prefilled
 * - POST /edit-post/:id    (admin) save edit
 * - GET  /delete/:id       (admin) delete post
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import type { ContentService } from '@/services/content.service';
import { DuplicateTitleError, UnknownAuthorError } from '@/errors/blog';
import { adminOnly } from '@/middleware/auth';
import { commentFormSchema, editPostFormSchema, postFormSchema, postIdParamSchema } from '@/validators/posts';
import { parseForm } from '@/validators/form';
import { indexPage, postFormPage, postPage } from '@/views/posts';
import { pageContext, principalOf } from '@/views/layout';

// Non-numeric ids are missing pages, not bad requests
const postIdParam = zValidator('param', postIdParamSchema, (result, c) => {
  if (!result.success) {
    return c.notFound();
  }
});

export function createPostRoutes({ content }: { content: ContentService }) {
  const routes = new Hono<HonoEnv>();

  routes.get('/', async (c) => {
    const posts = await content.listAllPosts();
    return c.html(indexPage(pageContext(c), posts));
  });

  routes.get('/post/:id', postIdParam, async (c) => {
    const { id } = c.req.valid('param');
    const page = await content.viewPost(id);
    return c.html(postPage(pageContext(c), page));
  });

  /**
   * POST /post/:id
   *
   * Anonymous visitors are redirected to /login by the error handler and
   * their comment is dropped.
   */
  routes.post('/post/:id', postIdParam, async (c) => {
    const { id } = c.req.valid('param');
    const form = await parseForm(c, commentFormSchema);

    if (!form.success) {
      const page = await content.viewPost(id);
      return c.html(postPage(pageContext(c), page, form), 422);
    }

    await content.addComment(id, form.data.comment, principalOf(c));
    return c.redirect(`/post/${id}`);
  });

  routes.get('/new-post', adminOnly, (c) => {
    return c.html(postFormPage(pageContext(c), { mode: 'create' }, {}));
  });

  routes.post('/new-post', adminOnly, async (c) => {
    const form = await parseForm(c, postFormSchema);
    if (!form.success) {
      return c.html(postFormPage(pageContext(c), { mode: 'create' }, form), 422);
    }

    const { title, subtitle, img_url, body } = form.data;
    try {
      await content.createPost({ title, subtitle, imageUrl: img_url, body }, principalOf(c));
    } catch (error) {
      if (error instanceof DuplicateTitleError) {
        return c.html(
          postFormPage(pageContext(c), { mode: 'create' }, { values: form.values, notice: error.message }),
          error.status
        );
      }
      throw error;
    }

    return c.redirect('/');
  });

  routes.get('/edit-post/:id', adminOnly, postIdParam, async (c) => {
    const { id } = c.req.valid('param');
    const { post, authorEmail } = await content.getPostForEdit(id, principalOf(c));

    return c.html(
      postFormPage(
        pageContext(c),
        { mode: 'edit', postId: id },
        {
          values: {
            title: post.title,
            subtitle: post.subtitle,
            author: authorEmail,
            img_url: post.imageUrl,
            body: post.body,
          },
        }
      )
    );
  });

  routes.post('/edit-post/:id', adminOnly, postIdParam, async (c) => {
    const { id } = c.req.valid('param');
    const form = await parseForm(c, editPostFormSchema);
    if (!form.success) {
      return c.html(postFormPage(pageContext(c), { mode: 'edit', postId: id }, form), 422);
    }

    const { title, subtitle, img_url, body, author } = form.data;
    try {
      await content.editPost(
        id,
        { title, subtitle, imageUrl: img_url, body, authorEmail: author },
        principalOf(c)
      );
    } catch (error) {
      if (error instanceof DuplicateTitleError || error instanceof UnknownAuthorError) {
        return c.html(
          postFormPage(pageContext(c), { mode: 'edit', postId: id }, { values: form.values, notice: error.message }),
          error.status
        );
      }
      throw error;
    }

    return c.redirect(`/post/${id}`);
  });

  routes.get('/delete/:id', adminOnly, postIdParam, async (c) => {
    const { id } = c.req.valid('param');
    await content.deletePost(id, principalOf(c));
    return c.redirect('/');
  });

  return routes;
}

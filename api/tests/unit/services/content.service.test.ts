/**
 * Content Service Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createContentService, type ContentService, type PostFields } from '@/services/content.service';
import {
  DuplicateTitleError,
  ForbiddenError,
  NotFoundError,
  UnauthenticatedError,
  UnknownAuthorError,
} from '@/errors/blog';
import { ANONYMOUS, type Principal } from '@/types/blog';
import { createMemoryStores, type MemoryStores } from '../../helpers/stores';

const fields: PostFields = {
  title: 'First',
  subtitle: 'A subtitle',
  imageUrl: 'https://images.example.com/first.jpg',
  body: '<p>Hello</p>',
};

describe('ContentService', () => {
  let stores: MemoryStores;
  let content: ContentService;
  let admin: Principal;
  let reader: Principal;

  beforeEach(async () => {
    stores = createMemoryStores();
    content = createContentService({
      content: stores.content,
      identity: stores.identity,
      now: () => new Date(2024, 3, 5, 12),
    });

    const bob = await stores.identity.create({ email: 'b@x.com', passwordHash: 'h', name: 'Bob' });
    const alice = await stores.identity.create({ email: 'a@x.com', passwordHash: 'h', name: 'Alice' });
    admin = { kind: 'user', user: bob };
    reader = { kind: 'user', user: alice };
  });

  describe('createPost', () => {
    it('stamps the publish date and the admin as author', async () => {
      const post = await content.createPost(fields, admin);

      expect(post).toEqual({
        id: 1,
        ...fields,
        date: 'April 05, 2024',
        authorId: 1,
      });
    });

    it('refuses non-admins without touching the store', async () => {
      await expect(content.createPost(fields, reader)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(content.createPost(fields, ANONYMOUS)).rejects.toBeInstanceOf(ForbiddenError);
      expect(stores.data.posts).toHaveLength(0);
    });

    it('rejects a duplicate title', async () => {
      await content.createPost(fields, admin);
      await expect(content.createPost(fields, admin)).rejects.toBeInstanceOf(DuplicateTitleError);
      expect(stores.data.posts).toHaveLength(1);
    });
  });

  describe('reading', () => {
    it('lists posts oldest first with their author name', async () => {
      await content.createPost(fields, admin);
      await content.createPost({ ...fields, title: 'Second' }, admin);

      const posts = await content.listAllPosts();
      expect(posts.map((post) => post.title)).toEqual(['First', 'Second']);
      expect(posts[0]?.authorName).toBe('Bob');
    });

    it('returns a post with its comments', async () => {
      const post = await content.createPost(fields, admin);
      await content.addComment(post.id, 'Nice', reader);

      const page = await content.viewPost(post.id);
      expect(page.post.title).toBe('First');
      expect(page.comments).toEqual([
        {
          id: 1,
          text: 'Nice',
          authorId: 2,
          postId: post.id,
          authorName: 'Alice',
          authorEmail: 'a@x.com',
        },
      ]);
    });

    it('raises NotFound for a missing post', async () => {
      await expect(content.viewPost(42)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('addComment', () => {
    it('requires a logged-in principal', async () => {
      const post = await content.createPost(fields, admin);

      await expect(content.addComment(post.id, 'Hi', ANONYMOUS)).rejects.toBeInstanceOf(
        UnauthenticatedError
      );
      expect(stores.data.comments).toHaveLength(0);
    });

    it('raises NotFound when the post does not exist', async () => {
      await expect(content.addComment(9, 'Hi', reader)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('editPost', () => {
    it('updates the fields and keeps the publish date', async () => {
      const post = await content.createPost(fields, admin);

      const edited = await content.editPost(
        post.id,
        { ...fields, title: 'Renamed', body: '<p>Changed</p>' },
        admin
      );

      expect(edited.title).toBe('Renamed');
      expect(edited.body).toBe('<p>Changed</p>');
      expect(edited.date).toBe('April 05, 2024');
      expect(edited.authorId).toBe(1);
    });

    it('reassigns the author by email', async () => {
      const post = await content.createPost(fields, admin);

      const edited = await content.editPost(post.id, { ...fields, authorEmail: 'a@x.com' }, admin);
      expect(edited.authorId).toBe(2);
    });

    it('rejects an author email with no account', async () => {
      const post = await content.createPost(fields, admin);

      await expect(
        content.editPost(post.id, { ...fields, authorEmail: 'ghost@x.com' }, admin)
      ).rejects.toBeInstanceOf(UnknownAuthorError);
      expect(stores.data.posts[0]?.authorId).toBe(1);
    });

    it('refuses non-admins', async () => {
      const post = await content.createPost(fields, admin);

      await expect(content.editPost(post.id, { ...fields, title: 'Hijacked' }, reader)).rejects.toBeInstanceOf(
        ForbiddenError
      );
      expect(stores.data.posts[0]?.title).toBe('First');
    });

    it('prefills the form with the author email', async () => {
      const post = await content.createPost(fields, admin);

      const { post: loaded, authorEmail } = await content.getPostForEdit(post.id, admin);
      expect(loaded.title).toBe('First');
      expect(authorEmail).toBe('b@x.com');
    });
  });

  describe('deletePost', () => {
    it('removes the post and its comments', async () => {
      const post = await content.createPost(fields, admin);
      await content.addComment(post.id, 'Nice', reader);

      await content.deletePost(post.id, admin);

      expect(stores.data.posts).toHaveLength(0);
      expect(stores.data.comments).toHaveLength(0);
    });

    it('refuses non-admins', async () => {
      const post = await content.createPost(fields, admin);

      await expect(content.deletePost(post.id, reader)).rejects.toBeInstanceOf(ForbiddenError);
      await expect(content.deletePost(post.id, ANONYMOUS)).rejects.toBeInstanceOf(ForbiddenError);
      expect(stores.data.posts).toHaveLength(1);
    });

    it('raises NotFound for a missing post', async () => {
      await expect(content.deletePost(5, admin)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});

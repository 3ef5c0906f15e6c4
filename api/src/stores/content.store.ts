/**
 * Content Store (Postgres)
 *
 * Posts and comments. Listings are in insertion order (ascending id).
 */

import { asc, eq } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { comments, posts, users } from '@/db/schema';
import { DuplicateTitleError, NotFoundError } from '@/errors/blog';
import type { PostPatch } from '@/types/blog';
import type { ContentStore } from './types';
import { isForeignKeyViolation, isUniqueViolation } from './pgErrors';

const postViewColumns = {
  id: posts.id,
  title: posts.title,
  subtitle: posts.subtitle,
  date: posts.date,
  body: posts.body,
  imageUrl: posts.imageUrl,
  authorId: posts.authorId,
  authorName: users.name,
};

const commentViewColumns = {
  id: comments.id,
  text: comments.text,
  authorId: comments.authorId,
  postId: comments.postId,
  authorName: users.name,
  authorEmail: users.email,
};

function hasChanges(patch: PostPatch): boolean {
  return Object.values(patch).some((value) => value !== undefined);
}

export function createPgContentStore(db: Database): ContentStore {
  async function getPost(id: number) {
    const [post] = await db
      .select(postViewColumns)
      .from(posts)
      .innerJoin(users, eq(posts.authorId, users.id))
      .where(eq(posts.id, id))
      .limit(1);
    return post ?? null;
  }

  return {
    async listPosts() {
      return db
        .select(postViewColumns)
        .from(posts)
        .innerJoin(users, eq(posts.authorId, users.id))
        .orderBy(asc(posts.id));
    },

    getPost,

    async createPost(input) {
      try {
        const [post] = await db.insert(posts).values(input).returning();
        return post;
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new DuplicateTitleError(input.title);
        }
        throw error;
      }
    },

    async updatePost(id, patch) {
      if (!hasChanges(patch)) {
        const [existing] = await db.select().from(posts).where(eq(posts.id, id)).limit(1);
        if (!existing) {
          throw new NotFoundError('post', id);
        }
        return existing;
      }

      try {
        const [updated] = await db.update(posts).set(patch).where(eq(posts.id, id)).returning();
        if (!updated) {
          throw new NotFoundError('post', id);
        }
        return updated;
      } catch (error) {
        if (isUniqueViolation(error) && patch.title !== undefined) {
          throw new DuplicateTitleError(patch.title);
        }
        throw error;
      }
    },

    async deletePost(id) {
      await db.transaction(async (tx) => {
        await tx.delete(comments).where(eq(comments.postId, id));
        const deleted = await tx.delete(posts).where(eq(posts.id, id)).returning({ id: posts.id });
        if (deleted.length === 0) {
          throw new NotFoundError('post', id);
        }
      });
    },

    async addComment(input) {
      try {
        const [comment] = await db.insert(comments).values(input).returning();
        return comment;
      } catch (error) {
        if (isForeignKeyViolation(error)) {
          throw new NotFoundError('post', input.postId);
        }
        throw error;
      }
    },

    async commentsForPost(postId) {
      return db
        .select(commentViewColumns)
        .from(comments)
        .innerJoin(users, eq(comments.authorId, users.id))
        .where(eq(comments.postId, postId))
        .orderBy(asc(comments.id));
    },
  };
}

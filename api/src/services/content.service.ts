/**
 * Content Service
 *
 * Posts and comments. Every mutation of a post goes through
 * requireAdmin() first, so a refused request never touches the store.
 */

import type { ContentStore, IdentityStore } from '@/stores';
import type { Comment, CommentView, Post, PostPatch, PostView, Principal, User } from '@/types/blog';
import { ForbiddenError, NotFoundError, UnauthenticatedError, UnknownAuthorError } from '@/errors/blog';
import { requireAdmin } from './accessControl';
import { formatPublishDate } from '@/utils/date';
import { logger } from '@/utils/logger';

export interface ContentServiceDeps {
  content: ContentStore;
  identity: IdentityStore;
  now?: () => Date;
}

export interface PostFields {
  title: string;
  subtitle: string;
  imageUrl: string;
  body: string;
}

export interface PostEdit extends PostFields {
  /** Reassigns the post when present */
  authorEmail?: string;
}

export interface PostPage {
  post: PostView;
  comments: CommentView[];
}

export function createContentService(deps: ContentServiceDeps) {
  const now = deps.now ?? (() => new Date());

  function authorize(principal: Principal, action: string): User {
    const check = requireAdmin(principal);
    if (!check.ok) {
      logger.warn('Admin action refused', {
        action,
        userId: principal.kind === 'user' ? principal.user.id : null,
      });
      throw new ForbiddenError();
    }
    return check.admin;
  }

  async function loadPost(id: number): Promise<PostView> {
    const post = await deps.content.getPost(id);
    if (!post) {
      throw new NotFoundError('post', id);
    }
    return post;
  }

  function listAllPosts(): Promise<PostView[]> {
    return deps.content.listPosts();
  }

  async function viewPost(id: number): Promise<PostPage> {
    const post = await loadPost(id);
    const comments = await deps.content.commentsForPost(id);
    return { post, comments };
  }

  /**
   * @throws UnauthenticatedError for anonymous visitors; nothing is stored
   */
  async function addComment(postId: number, text: string, principal: Principal): Promise<Comment> {
    if (principal.kind === 'anonymous') {
      throw new UnauthenticatedError('You need to login or register to comment.');
    }

    const comment = await deps.content.addComment({
      text,
      authorId: principal.user.id,
      postId,
    });
    logger.info('Comment added', { commentId: comment.id, postId, userId: principal.user.id });
    return comment;
  }

  async function createPost(fields: PostFields, principal: Principal): Promise<Post> {
    const admin = authorize(principal, 'create-post');

    const post = await deps.content.createPost({
      ...fields,
      date: formatPublishDate(now()),
      authorId: admin.id,
    });
    logger.info('Post created', { postId: post.id, userId: admin.id });
    return post;
  }

  /**
   * Load a post with its author's email to prefill the edit form
   */
  async function getPostForEdit(
    id: number,
    principal: Principal
  ): Promise<{ post: PostView; authorEmail: string }> {
    authorize(principal, 'edit-post');
    const post = await loadPost(id);
    const author = await deps.identity.findById(post.authorId);
    return { post, authorEmail: author?.email ?? '' };
  }

  /**
   * Apply an edit. The publish date is never part of the update.
   *
   * @throws UnknownAuthorError when authorEmail matches no account
   */
  async function editPost(id: number, edit: PostEdit, principal: Principal): Promise<Post> {
    const admin = authorize(principal, 'edit-post');

    const patch: PostPatch = {
      title: edit.title,
      subtitle: edit.subtitle,
      imageUrl: edit.imageUrl,
      body: edit.body,
    };

    if (edit.authorEmail) {
      const author = await deps.identity.findByEmail(edit.authorEmail);
      if (!author) {
        throw new UnknownAuthorError(edit.authorEmail);
      }
      patch.authorId = author.id;
    }

    const post = await deps.content.updatePost(id, patch);
    logger.info('Post edited', { postId: id, userId: admin.id });
    return post;
  }

  async function deletePost(id: number, principal: Principal): Promise<void> {
    const admin = authorize(principal, 'delete-post');
    await deps.content.deletePost(id);
    logger.info('Post deleted', { postId: id, userId: admin.id });
  }

  return {
    listAllPosts,
    viewPost,
    addComment,
    createPost,
    getPostForEdit,
    editPost,
    deletePost,
  };
}

export type ContentService = ReturnType<typeof createContentService>;

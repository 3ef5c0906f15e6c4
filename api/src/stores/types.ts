/**
 * Store Interfaces
 *
 * The services depend on these, never on Drizzle directly. The Postgres
 * implementations live beside this file; tests use in-process ones.
 */

import type {
  Comment,
  CommentView,
  NewComment,
  NewPost,
  NewSession,
  NewUser,
  Post,
  PostPatch,
  PostView,
  Session,
  User,
} from '@/types/blog';

export interface IdentityStore {
  /** @throws DuplicateEmailError when the email is already taken */
  create(input: NewUser): Promise<User>;
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
}

export interface ContentStore {
  /** All posts, oldest first */
  listPosts(): Promise<PostView[]>;
  getPost(id: number): Promise<PostView | null>;
  /** @throws DuplicateTitleError */
  createPost(input: NewPost): Promise<Post>;
  /** @throws NotFoundError, DuplicateTitleError */
  updatePost(id: number, patch: PostPatch): Promise<Post>;
  /** Removes the post and its comments. @throws NotFoundError */
  deletePost(id: number): Promise<void>;
  /** @throws NotFoundError when the post does not exist */
  addComment(input: NewComment): Promise<Comment>;
  /** Comments on a post, oldest first */
  commentsForPost(postId: number): Promise<CommentView[]>;
}

export interface SessionStore {
  create(input: NewSession): Promise<Session>;
  findActive(tokenHash: string, now: Date): Promise<Session | null>;
  delete(tokenHash: string): Promise<void>;
  /** @returns number of sessions removed */
  deleteExpired(now: Date): Promise<number>;
}

export interface Stores {
  identity: IdentityStore;
  content: ContentStore;
  sessions: SessionStore;
}

/**
 * Blog Domain Types
 *
 * Row shapes returned by the stores and the read models the views render.
 */

export interface User {
  id: number;
  email: string;
  passwordHash: string;
  name: string;
}

export interface Post {
  id: number;
  title: string;
  subtitle: string;
  date: string;
  body: string;
  imageUrl: string;
  authorId: number;
}

export interface PostView extends Post {
  authorName: string;
}

export interface Comment {
  id: number;
  text: string;
  authorId: number;
  postId: number;
}

export interface CommentView extends Comment {
  authorName: string;
  authorEmail: string;
}

export interface Session {
  id: number;
  tokenHash: string;
  userId: number;
  expiresAt: Date;
}

/**
 * Identity attached to the current request
 */
export type Principal =
  | { kind: 'anonymous' }
  | { kind: 'user'; user: User };

export const ANONYMOUS: Principal = { kind: 'anonymous' };

export type NewUser = Pick<User, 'email' | 'passwordHash' | 'name'>;

export type NewPost = Omit<Post, 'id'>;

/**
 * Fields an edit may change. The publish date is not among them.
 */
export type PostPatch = Partial<Pick<Post, 'title' | 'subtitle' | 'body' | 'imageUrl' | 'authorId'>>;

export type NewComment = Omit<Comment, 'id'>;

export type NewSession = Omit<Session, 'id'>;

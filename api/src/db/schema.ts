/**
 * Blog Database Schema Definitions
 * Drizzle ORM schema for PostgreSQL
 *
 * The DDL that creates these tables on boot lives in ./bootstrap.ts and
 * must be kept in step with this file.
 */

import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Registered accounts. The account with id 1 is the blog's administrator.
 */
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  email: varchar('email', { length: 320 }).notNull().unique(),
  passwordHash: varchar('password_hash', { length: 255 }).notNull(),
  name: varchar('name', { length: 1000 }).notNull(),
});

export const posts = pgTable(
  'posts',
  {
    id: serial('id').primaryKey(),
    title: varchar('title', { length: 250 }).notNull().unique(),
    subtitle: varchar('subtitle', { length: 250 }).notNull(),
    // Display string ("April 05, 2024"), fixed at creation
    date: varchar('date', { length: 250 }).notNull(),
    body: text('body').notNull(),
    imageUrl: varchar('image_url', { length: 2048 }).notNull(),
    authorId: integer('author_id').notNull().references(() => users.id),
  },
  (table) => ({
    authorIdx: index('idx_posts_author').on(table.authorId),
  })
);

export const comments = pgTable(
  'comments',
  {
    id: serial('id').primaryKey(),
    text: text('text').notNull(),
    authorId: integer('author_id').notNull().references(() => users.id),
    postId: integer('post_id').notNull().references(() => posts.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    postIdx: index('idx_comments_post').on(table.postId),
  })
);

/**
 * Login sessions. Only the SHA-256 hash of the cookie token is stored.
 */
export const sessions = pgTable(
  'sessions',
  {
    id: serial('id').primaryKey(),
    tokenHash: varchar('token_hash', { length: 64 }).notNull().unique(),
    userId: integer('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    expiresIdx: index('idx_sessions_expires').on(table.expiresAt),
  })
);

/**
 * Post and Comment Validation Schemas
 */

import { z } from 'zod';

// Upper bound of the int4 id columns
const POSTGRES_INT_MAX = 2_147_483_647;

/**
 * Post id path parameter
 * /post/:id, /edit-post/:id, /delete/:id
 */
export const postIdParamSchema = z.object({
  id: z
    .string()
    .regex(/^[1-9]\d*$/)
    .pipe(z.coerce.number().int().max(POSTGRES_INT_MAX)),
});

/**
 * POST /post/:id
 */
export const commentFormSchema = z.object({
  comment: z.string({ required_error: 'Comment is required' }).trim().min(1, 'Comment is required'),
});

const requiredText = (label: string, max?: number) => {
  const field = z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);
  return max ? field.max(max, `${label} must be at most ${max} characters`) : field;
};

/**
 * POST /new-post
 */
export const postFormSchema = z.object({
  title: requiredText('Title', 250),
  subtitle: requiredText('Subtitle', 250),
  img_url: requiredText('Image URL', 2048)
    .url('Enter a valid image URL')
    .refine((value) => /^https?:\/\//i.test(value), 'Image URL must start with http:// or https://'),
  body: requiredText('Body'),
});

/**
 * POST /edit-post/:id
 *
 * A blank author keeps the current one.
 */
export const editPostFormSchema = postFormSchema.extend({
  author: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().email("Enter the author's email").optional()
  ),
});

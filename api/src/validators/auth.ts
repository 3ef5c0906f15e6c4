/**
 * Authentication Validation Schemas
 *
 * Zod schemas for the register and login forms
 */

import { z } from 'zod';

const emailField = z
  .string({ required_error: 'Email is required' })
  .trim()
  .min(1, 'Email is required')
  .email('Enter a valid email address')
  .max(320);

/**
 * POST /register
 */
export const registerFormSchema = z.object({
  email: emailField,
  password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
  name: z.string({ required_error: 'Name is required' }).trim().min(1, 'Name is required').max(1000),
});

/**
 * POST /login
 */
export const loginFormSchema = z.object({
  email: emailField,
  password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
});

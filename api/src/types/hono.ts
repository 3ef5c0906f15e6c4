/**
 * Hono Type Extensions
 *
 * Custom types for Hono context variables
 */

import type { Principal } from './blog';

/**
 * Environment variables for Hono context
 */
export type HonoEnv = {
  Variables: {
    // Set by the session resolver; unset only when a request fails before it runs
    principal?: Principal;
    sessionToken?: string;
  };
};

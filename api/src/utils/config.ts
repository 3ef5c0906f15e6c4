/**
 * Process Configuration
 *
 * Read once at startup and never mutated afterwards. A missing session
 * secret or database URL stops the process before it serves anything.
 */

import { z } from 'zod';
import { ConfigError } from '@/errors/blog';

const configSchema = z.object({
  SESSION_SECRET: z
    .string({ required_error: 'SESSION_SECRET environment variable is required' })
    .min(16, 'SESSION_SECRET must be at least 16 characters'),
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL environment variable is required' })
    .url('DATABASE_URL must be a connection URL'),
  PORT: z.coerce.number().int().positive().default(3000),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  SESSION_TTL_DAYS: z.coerce.number().int().positive().default(7),
  PASSWORD_HASH_ITERATIONS: z.coerce.number().int().min(1000).default(600_000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  // Origin browsers use to reach the app, e.g. https://blog.example behind a TLS proxy
  PUBLIC_ORIGIN: z
    .string()
    .url('PUBLIC_ORIGIN must be a URL such as https://blog.example')
    .transform((value) => new URL(value).origin)
    .optional(),
}).superRefine((env, ctx) => {
  if (env.NODE_ENV === 'production' && !env.PUBLIC_ORIGIN) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['PUBLIC_ORIGIN'],
      message: 'PUBLIC_ORIGIN environment variable is required in production',
    });
  }
});

export interface AppConfig {
  sessionSecret: string;
  databaseUrl: string;
  port: number;
  dbPoolSize: number;
  sessionTtlDays: number;
  passwordHashIterations: number;
  nodeEnv: 'development' | 'test' | 'production';
  /** Accepted Origin for form posts; unset means the request's own origin */
  publicOrigin?: string;
}

/**
 * Validate the environment and return the typed configuration
 *
 * Empty strings count as unset, so `SESSION_SECRET=` in a .env file fails
 * the same way as a missing variable.
 *
 * @throws ConfigError listing every problem found
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = configSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    sessionSecret: parsed.SESSION_SECRET,
    databaseUrl: parsed.DATABASE_URL,
    port: parsed.PORT,
    dbPoolSize: parsed.DB_POOL_SIZE,
    sessionTtlDays: parsed.SESSION_TTL_DAYS,
    passwordHashIterations: parsed.PASSWORD_HASH_ITERATIONS,
    nodeEnv: parsed.NODE_ENV,
    publicOrigin: parsed.PUBLIC_ORIGIN,
  };
}

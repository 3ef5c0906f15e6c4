import { describe, it, expect } from 'vitest';
import { loadConfig } from '@/utils/config';
import { ConfigError } from '@/errors/blog';

const required = {
  SESSION_SECRET: 'test-secret-key-for-testing-only',
  DATABASE_URL: 'postgresql://localhost:5432/blog_test',
};

function problemsOf(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    expect(loadConfig({ ...required })).toEqual({
      sessionSecret: 'test-secret-key-for-testing-only',
      databaseUrl: 'postgresql://localhost:5432/blog_test',
      port: 3000,
      dbPoolSize: 10,
      sessionTtlDays: 7,
      passwordHashIterations: 600000,
      nodeEnv: 'development',
    });
  });

  it('coerces numeric settings from strings', () => {
    const config = loadConfig({
      ...required,
      PORT: '8080',
      SESSION_TTL_DAYS: '30',
      NODE_ENV: 'production',
      PUBLIC_ORIGIN: 'https://blog.example',
    });
    expect(config.port).toBe(8080);
    expect(config.sessionTtlDays).toBe(30);
    expect(config.nodeEnv).toBe('production');
  });

  it('refuses to start without a session secret', () => {
    expect(problemsOf({ DATABASE_URL: required.DATABASE_URL })).toEqual([
      'SESSION_SECRET: SESSION_SECRET environment variable is required',
    ]);
  });

  it('treats an empty database URL as missing', () => {
    expect(problemsOf({ SESSION_SECRET: required.SESSION_SECRET, DATABASE_URL: '' })).toEqual([
      'DATABASE_URL: DATABASE_URL environment variable is required',
    ]);
  });

  it('reports every problem at once', () => {
    expect(problemsOf({ SESSION_SECRET: 'short' })).toEqual([
      'SESSION_SECRET: SESSION_SECRET must be at least 16 characters',
      'DATABASE_URL: DATABASE_URL environment variable is required',
    ]);
  });

  it('requires the public origin in production', () => {
    expect(problemsOf({ ...required, NODE_ENV: 'production' })).toEqual([
      'PUBLIC_ORIGIN: PUBLIC_ORIGIN environment variable is required in production',
    ]);
  });

  it('reduces the public origin to scheme, host and port', () => {
    const config = loadConfig({ ...required, PUBLIC_ORIGIN: 'https://blog.example/' });
    expect(config.publicOrigin).toBe('https://blog.example');
  });

  it('throws a ConfigError', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });
});

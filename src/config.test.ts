import { describe, expect, it } from 'vitest';

import { loadEnv } from './config';

describe('loadEnv', () => {
  it('defaults to debug logging outside production', () => {
    expect(loadEnv({})).toEqual({ NODE_ENV: 'development', LOG_LEVEL: 'debug' });
  });

  it('defaults to info logging in production', () => {
    expect(loadEnv({ NODE_ENV: 'production' })).toEqual({ NODE_ENV: 'production', LOG_LEVEL: 'info' });
  });

  it('accepts a known level and ignores an unknown one', () => {
    expect(loadEnv({ NODE_ENV: 'test', LOG_LEVEL: 'WARN' }).LOG_LEVEL).toBe('warn');
    expect(loadEnv({ NODE_ENV: 'test', LOG_LEVEL: 'loud' }).LOG_LEVEL).toBe('debug');
  });
});

import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../config.js';

describe('resolveConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(resolveConfig({}, {})).toEqual({
      token: undefined,
      baseUrl: 'https://api.github.com',
      ttl: 600_000,
      maxCacheAge: 30 * 24 * 60 * 60 * 1000,
      cacheDir: path.join(os.homedir(), '.cache', 'repo-tree-sync'),
      timeoutMs: 10_000,
      concurrency: 4,
    });
  });

  it('reads the environment, converting seconds to milliseconds', () => {
    const config = resolveConfig(
      {},
      {
        GITHUB_TOKEN: 'test-token',
        GITHUB_API_URL: 'https://ghe.test/api/v3/',
        TREE_CACHE_DIR: '/tmp/trees',
        TREE_CACHE_TTL: '30',
        TREE_CACHE_MAX_AGE: '3600',
        TREE_SYNC_TIMEOUT: '2.5',
        TREE_SYNC_CONCURRENCY: '8',
      },
    );

    expect(config).toEqual({
      token: 'test-token',
      baseUrl: 'https://ghe.test/api/v3',
      ttl: 30_000,
      maxCacheAge: 3_600_000,
      cacheDir: '/tmp/trees',
      timeoutMs: 2_500,
      concurrency: 8,
    });
  });

  it('prefers explicit options over the environment', () => {
    const config = resolveConfig({ token: 'explicit', ttl: 5 }, { GITHUB_TOKEN: 'from-env', TREE_CACHE_TTL: '30' });
    expect(config.token).toBe('explicit');
    expect(config.ttl).toBe(5);
  });

  it('treats an empty token as none', () => {
    expect(resolveConfig({}, { GITHUB_TOKEN: '' }).token).toBeUndefined();
  });

  it('rejects invalid numbers, naming the variable', () => {
    expect(() => resolveConfig({}, { TREE_CACHE_TTL: 'soon' })).toThrow(
      'TREE_CACHE_TTL must be a positive number of seconds, got "soon"',
    );
    expect(() => resolveConfig({}, { TREE_SYNC_CONCURRENCY: '1.5' })).toThrow(
      'TREE_SYNC_CONCURRENCY must be a positive integer, got "1.5"',
    );
  });
});

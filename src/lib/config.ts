import os from 'node:os';
import path from 'node:path';
import { DEFAULT_TIMEOUT_MS } from './github.js';
import { DEFAULT_MAX_CACHE_AGE, DEFAULT_TTL } from './sync.js';
import type { SyncConfig } from './types.js';

export const DEFAULT_BASE_URL = 'https://api.github.com';

type Env = Record<string, string | undefined>;

function seconds(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new TypeError(`${name} must be a positive number of seconds, got "${raw}"`);
  }
  return value * 1000;
}

function positiveInteger(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new TypeError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build the engine configuration. Explicit options win over the environment:
 *
 *   GITHUB_TOKEN           bearer token for higher rate limits
 *   GITHUB_API_URL         API base URL for self-hosted instances
 *   TREE_CACHE_DIR         cache directory (default: ~/.cache/repo-tree-sync)
 *   TREE_CACHE_TTL         freshness window in seconds (default: 600)
 *   TREE_CACHE_MAX_AGE     sweep threshold in seconds (default: 30 days)
 *   TREE_SYNC_TIMEOUT      per-request timeout in seconds (default: 10)
 *   TREE_SYNC_CONCURRENCY  repositories synced in parallel (default: 4)
 */
export function resolveConfig(options: Partial<SyncConfig> = {}, env: Env = process.env): SyncConfig {
  const token = options.token ?? env['GITHUB_TOKEN'];
  return {
    token: token || undefined,
    baseUrl: (options.baseUrl ?? env['GITHUB_API_URL'] ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
    ttl: options.ttl ?? seconds(env, 'TREE_CACHE_TTL') ?? DEFAULT_TTL,
    maxCacheAge: options.maxCacheAge ?? seconds(env, 'TREE_CACHE_MAX_AGE') ?? DEFAULT_MAX_CACHE_AGE,
    cacheDir: options.cacheDir ?? env['TREE_CACHE_DIR'] ?? path.join(os.homedir(), '.cache', 'repo-tree-sync'),
    timeoutMs: options.timeoutMs ?? seconds(env, 'TREE_SYNC_TIMEOUT') ?? DEFAULT_TIMEOUT_MS,
    concurrency: options.concurrency ?? positiveInteger(env, 'TREE_SYNC_CONCURRENCY') ?? 4,
  };
}

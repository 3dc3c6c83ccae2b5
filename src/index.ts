import { FileCacheStore } from './lib/cache-store.js';
import { resolveConfig } from './lib/config.js';
import { GitHubTransport } from './lib/github.js';
import { TreeSync } from './lib/sync.js';
import type { SyncConfig } from './lib/types.js';

export * from './lib/types.js';
export * from './lib/errors.js';
export * from './lib/tree.js';
export * from './lib/cache-store.js';
export * from './lib/github.js';
export * from './lib/sync.js';
export { resolveConfig, DEFAULT_BASE_URL } from './lib/config.js';

/** Wire the GitHub transport and the on-disk cache from a configuration. */
export function createTreeSync(options: Partial<SyncConfig> = {}): TreeSync {
  const config = resolveConfig(options);
  return new TreeSync({
    transport: new GitHubTransport({ token: config.token, baseUrl: config.baseUrl, timeoutMs: config.timeoutMs }),
    store: new FileCacheStore(config.cacheDir),
    ttl: config.ttl,
    maxCacheAge: config.maxCacheAge,
    concurrency: config.concurrency,
  });
}

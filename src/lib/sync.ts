import type { CacheStore } from './cache-store.js';
import {
  NormalizationError,
  RateLimitedError,
  SyncError,
  TransportError,
  isRecoverable,
  type SyncWarning,
} from './errors.js';
import type { TransportClient, TreeFetchResult } from './github.js';
import { buildTree, parseTreeListing, type TreeListing } from './tree.js';
import {
  cacheKey,
  createRepositoryRef,
  formatRepository,
  type CacheRecord,
  type RepositoryRef,
  type SyncProgress,
  type TreeNode,
} from './types.js';

export const DEFAULT_TTL = 10 * 60 * 1000;
export const DEFAULT_MAX_CACHE_AGE = 30 * 24 * 60 * 60 * 1000;

export interface TreeSyncOptions {
  transport: TransportClient;
  store: CacheStore;
  /** Freshness window (ms) for new records. */
  ttl?: number;
  /** Default idle threshold (ms) for `sweep`. */
  maxCacheAge?: number;
  /** Repositories resolved in parallel by `syncAccount`. */
  concurrency?: number;
  now?: () => number;
}

export interface ResolveOptions {
  /** Skip the freshness check and fetch without a validator. */
  forceRefresh?: boolean;
  /** Abandons this caller's wait only; a shared fetch still completes. */
  signal?: AbortSignal;
}

export interface ResolveResult {
  repository: RepositoryRef;
  tree: TreeNode;
  /**
   * - `cache`: fresh record, no request made
   * - `revalidated`: host confirmed the cached snapshot
   * - `fetched`: a new snapshot was built
   * - `stale`: refresh failed; the expired snapshot was served
   */
  source: 'cache' | 'revalidated' | 'fetched' | 'stale';
  fetchedAt: number;
  truncated: boolean;
  warning?: SyncWarning;
}

export interface AccountSyncOptions {
  forceRefresh?: boolean;
  /** Only sync repositories whose names match. */
  repoFilter?: RegExp;
  concurrency?: number;
  onProgress?: (progress: SyncProgress) => void;
}

export interface RepositoryOutcome {
  repository: RepositoryRef;
  result?: ResolveResult;
  error?: SyncError;
}

export interface AccountSyncResult {
  owner: string;
  repositories: RepositoryOutcome[];
  /** Set when the account listing itself was served from the cache. */
  warning?: SyncWarning;
}

interface PendingFetch {
  promise: Promise<ResolveResult>;
  /** Resolves once `promise` settles, whatever the outcome. */
  settled: Promise<void>;
  forced: boolean;
}

/** Race a shared promise against one caller's abort signal without cancelling the promise. */
function withSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

async function mapConcurrent<T, R>(items: readonly T[], limit: number, task: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index]!);
    }
  };
  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker));
  return results;
}

/**
 * Keeps repository tree snapshots in a {@link CacheStore} in step with the
 * host.
 *
 * A fresh record is served without touching the network. A stale one is
 * revalidated with its validator; a 304 only extends its lifetime, a 200
 * rebuilds the snapshot. Rate limits and transient failures fall back to the
 * stale snapshot when one exists. At most one fetch per key is in flight;
 * concurrent callers share it.
 */
export class TreeSync {
  readonly ttl: number;
  readonly maxCacheAge: number;
  private readonly transport: TransportClient;
  private readonly store: CacheStore;
  private readonly concurrency: number;
  private readonly now: () => number;
  private readonly pending = new Map<string, PendingFetch>();

  constructor(options: TreeSyncOptions) {
    this.transport = options.transport;
    this.store = options.store;
    this.ttl = options.ttl ?? DEFAULT_TTL;
    this.maxCacheAge = options.maxCacheAge ?? DEFAULT_MAX_CACHE_AGE;
    this.concurrency = options.concurrency ?? 4;
    this.now = options.now ?? Date.now;
  }

  /** @throws SyncError */
  async resolve(repository: RepositoryRef, options: ResolveOptions = {}): Promise<ResolveResult> {
    const key = cacheKey(repository);
    const forced = options.forceRefresh ?? false;

    if (!forced) {
      const inFlight = this.pending.get(key);
      if (inFlight) return withSignal(inFlight.promise, options.signal);

      const record = await this.store.get(key);
      if (record && this.now() - record.fetchedAt < record.ttl) {
        return this.result(record, 'cache');
      }
    }

    return withSignal(this.schedule(key, repository, forced), options.signal);
  }

  async invalidate(repository: RepositoryRef): Promise<void> {
    await this.store.delete(cacheKey(repository));
  }

  async listCachedRepositories(owner: string): Promise<RepositoryRef[]> {
    const wanted = owner.toLowerCase();
    return (await this.store.list())
      .map((record) => record.repository)
      .filter((repository) => repository.owner.toLowerCase() === wanted)
      .sort((a, b) => (a.name === b.name ? compare(a.ref, b.ref) : compare(a.name, b.name)));
  }

  /** Purge idle records. Never runs as part of `resolve`. */
  sweep(maxAge = this.maxCacheAge): Promise<string[]> {
    return this.store.sweep(maxAge, this.now());
  }

  /**
   * Resolve every repository of an account at its default branch.
   *
   * Failures are collected per repository instead of aborting the run. If the
   * listing itself cannot be fetched because of a rate limit or a transient
   * failure, the repositories already cached for the account are used.
   */
  async syncAccount(owner: string, options: AccountSyncOptions = {}): Promise<AccountSyncResult> {
    const { forceRefresh, repoFilter, onProgress } = options;
    let completed = 0;
    let failed = 0;
    let total = 0;
    const emit = (p: Partial<SyncProgress> & { phase: SyncProgress['phase'] }) => {
      onProgress?.({ completed, failed, total, ...p });
    };

    emit({ phase: 'repos', message: `Listing repositories for ${owner}…` });
    let warning: SyncWarning | undefined;
    let repositories: RepositoryRef[];
    try {
      const remote = await this.transport.listRepositories(owner);
      repositories = remote.map((repo) => createRepositoryRef(repo.owner, repo.name, repo.defaultBranch));
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      const cached = isRecoverable(err) ? await this.listCachedRepositories(owner) : [];
      if (cached.length === 0) throw SyncError.fromTransport(undefined, err);
      warning = this.staleWarning(err, `repositories of ${owner}`);
      repositories = cached;
    }

    if (repoFilter) repositories = repositories.filter((repository) => repoFilter.test(repository.name));
    total = repositories.length;

    const outcomes = await mapConcurrent(repositories, options.concurrency ?? this.concurrency, async (repository) => {
      emit({ phase: 'tree', repository, message: `Syncing ${formatRepository(repository)}` });
      try {
        const result = await this.resolve(repository, { forceRefresh });
        completed++;
        return { repository, result };
      } catch (err) {
        if (!(err instanceof SyncError)) throw err;
        failed++;
        return { repository, error: err };
      }
    });

    emit({ phase: 'done' });
    return warning ? { owner, repositories: outcomes, warning } : { owner, repositories: outcomes };
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private schedule(key: string, repository: RepositoryRef, forced: boolean): Promise<ResolveResult> {
    const previous = this.pending.get(key);
    if (previous && (previous.forced || !forced)) return previous.promise;

    // A forced refresh must not reuse a conditional answer: it queues behind
    // the pending fetch and then asks unconditionally.
    const run = async () => {
      if (previous) await previous.settled;
      return this.refresh(key, repository, forced);
    };
    const promise: Promise<ResolveResult> = run().finally(() => {
      if (this.pending.get(key)?.promise === promise) this.pending.delete(key);
    });
    const settled = promise.then(
      () => undefined,
      () => undefined,
    );
    this.pending.set(key, { promise, settled, forced });
    return promise;
  }

  private async refresh(key: string, repository: RepositoryRef, forced: boolean): Promise<ResolveResult> {
    const record = await this.store.get(key);
    const validator = forced ? undefined : record?.validator;

    let response: TreeFetchResult;
    try {
      response = await this.transport.fetchTree(repository, { validator });
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      return this.recover(key, repository, record, err);
    }

    if (response.status === 304) {
      // A record invalidated while the request was out must not come back.
      const current = record && (await this.store.get(key));
      if (!current) {
        if (!validator) {
          throw new SyncError('corrupt', `Unexpected 304 for ${formatRepository(repository)}`, { repository });
        }
        return this.refresh(key, repository, true);
      }
      const next: CacheRecord = { ...current, fetchedAt: this.now(), ttl: this.ttl };
      await this.store.put(key, next);
      return this.result(next, 'revalidated');
    }

    let listing: TreeListing;
    let tree: TreeNode;
    try {
      listing = parseTreeListing(response.body);
      tree = buildTree(listing.entries);
    } catch (err) {
      if (!(err instanceof NormalizationError)) throw err;
      throw new SyncError('corrupt', `Invalid tree listing for ${formatRepository(repository)}: ${err.message}`, {
        repository,
        cause: err,
      });
    }
    if (listing.truncated) {
      console.warn(`Tree for ${formatRepository(repository)} was truncated by the GitHub API.`);
    }

    const unchanged = record !== undefined && record.rootContentId === listing.sha;
    const next: CacheRecord = {
      key,
      repository: record?.repository ?? repository,
      snapshot: unchanged ? record.snapshot : tree,
      rootContentId: listing.sha,
      validator: response.validator ?? listing.sha,
      truncated: listing.truncated,
      fetchedAt: this.now(),
      ttl: this.ttl,
    };
    await this.store.put(key, next);
    return this.result(next, unchanged ? 'revalidated' : 'fetched');
  }

  private async recover(
    key: string,
    repository: RepositoryRef,
    record: CacheRecord | undefined,
    error: TransportError,
  ): Promise<ResolveResult> {
    const failure = SyncError.fromTransport(repository, error);
    if (failure.kind === 'not-found') {
      // A vanished repository must not keep answering from the cache.
      await this.store.delete(key);
      throw failure;
    }
    if (!record || !isRecoverable(error)) throw failure;

    const warning = this.staleWarning(error, formatRepository(repository));
    return this.result(record, 'stale', warning);
  }

  private staleWarning(error: TransportError, label: string): SyncWarning {
    const limited = error instanceof RateLimitedError;
    const message = limited
      ? `Serving cached ${label}; rate limited until ${new Date(error.retryAt).toISOString()}`
      : `Serving cached ${label}; refresh failed: ${error.message}`;
    console.warn(message);
    return limited
      ? { kind: 'served-stale', reason: 'rate-limited', retryAt: error.retryAt, message }
      : { kind: 'served-stale', reason: 'transient', message };
  }

  private result(record: CacheRecord, source: ResolveResult['source'], warning?: SyncWarning): ResolveResult {
    const result: ResolveResult = {
      repository: record.repository,
      tree: record.snapshot,
      source,
      fetchedAt: record.fetchedAt,
      truncated: record.truncated,
    };
    if (warning) result.warning = warning;
    return result;
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export type EntryKind = 'file' | 'directory';

/** Identifies one repository at one branch, tag or commit. */
export interface RepositoryRef {
  readonly owner: string;
  readonly name: string;
  readonly ref: string;
}

export interface TreeEntry {
  /** Path segments, e.g. `['src', 'main.ts']`. */
  readonly path: readonly string[];
  readonly kind: EntryKind;
  readonly size?: number;
  /** Host blob/tree id – changes if and only if the content changes. */
  readonly contentId: string;
}

export interface TreeNode {
  readonly name: string;
  /** Slash-joined path from the root; `''` for the root itself. */
  readonly path: string;
  readonly kind: EntryKind;
  /** Children keyed by name, in lexicographic order. */
  readonly children: ReadonlyMap<string, TreeNode>;
  /** Absent on the root and on directories implied by deeper paths. */
  readonly entry?: TreeEntry;
}

export interface CacheRecord {
  readonly key: string;
  readonly repository: RepositoryRef;
  readonly snapshot: TreeNode;
  /** Root tree id reported by the host. */
  readonly rootContentId: string;
  /** ETag when the host sent one, otherwise the root tree id. */
  readonly validator?: string;
  /** The host cut the recursive listing short. */
  readonly truncated: boolean;
  /** Unix timestamp (ms) of the last successful fetch or revalidation. */
  readonly fetchedAt: number;
  /** Freshness window (ms) in force when the record was written. */
  readonly ttl: number;
}

export interface RateLimit {
  remaining?: number;
  /** Unix timestamp (ms) when the quota resets. */
  resetAt?: number;
}

export interface RemoteRepository {
  owner: string;
  name: string;
  defaultBranch: string;
}

export interface SyncConfig {
  token?: string;
  baseUrl: string;
  /** Cache freshness window (ms). */
  ttl: number;
  /** Records idle for longer than this (ms) are removed by a sweep. */
  maxCacheAge: number;
  cacheDir: string;
  /** Per-request timeout (ms). */
  timeoutMs: number;
  /** Repositories resolved in parallel by an account sync. */
  concurrency: number;
}

export interface SyncProgress {
  phase: 'repos' | 'tree' | 'done';
  repository?: RepositoryRef;
  completed: number;
  failed: number;
  total: number;
  message?: string;
}

export function createRepositoryRef(owner: string, name: string, ref: string): RepositoryRef {
  const parts = { owner: owner.trim(), name: name.trim(), ref: ref.trim() };
  for (const [field, value] of Object.entries(parts)) {
    if (!value) {
      throw new TypeError(`Repository ${field} must not be empty`);
    }
  }
  return Object.freeze(parts);
}

/** Owner and name are case-insensitive on the host; refs are not. */
export function cacheKey(repository: RepositoryRef): string {
  return `${repository.owner.toLowerCase()}/${repository.name.toLowerCase()}@${repository.ref}`;
}

export function formatRepository(repository: RepositoryRef): string {
  return `${repository.owner}/${repository.name}@${repository.ref}`;
}

import { createHash, randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { type } from 'arktype';
import { NormalizationError } from './errors.js';
import { buildTree, collectEntries, formatPath, splitPath } from './tree.js';
import type { CacheRecord } from './types.js';

/**
 * Persistent map from cache key to tree snapshot. Writes always replace a
 * whole record, so a reader sees either the previous or the next record.
 */
export interface CacheStore {
  /** Returns `undefined` for missing or unreadable records; counts as a read for `sweep`. */
  get(key: string): Promise<CacheRecord | undefined>;
  put(key: string, record: CacheRecord): Promise<void>;
  delete(key: string): Promise<void>;
  /** Remove records idle (neither fetched nor read) for longer than `maxAge` ms. Returns removed keys. */
  sweep(maxAge: number, now?: number): Promise<string[]>;
  list(): Promise<CacheRecord[]>;
}

export interface StoreOptions {
  now?: () => number;
}

// ── In-memory ────────────────────────────────────────────────────────────────

export class MemoryCacheStore implements CacheStore {
  private readonly records = new Map<string, { record: CacheRecord; touchedAt: number }>();
  private readonly now: () => number;

  constructor(options: StoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<CacheRecord | undefined> {
    const slot = this.records.get(key);
    if (!slot) return undefined;
    slot.touchedAt = this.now();
    return slot.record;
  }

  async put(key: string, record: CacheRecord): Promise<void> {
    this.records.set(key, { record, touchedAt: this.now() });
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  async sweep(maxAge: number, now = this.now()): Promise<string[]> {
    const removed: string[] = [];
    for (const [key, slot] of this.records) {
      if (now - Math.max(slot.record.fetchedAt, slot.touchedAt) > maxAge) {
        this.records.delete(key);
        removed.push(key);
      }
    }
    return removed;
  }

  async list(): Promise<CacheRecord[]> {
    return [...this.records.values()].map((slot) => slot.record);
  }
}

// ── On disk ──────────────────────────────────────────────────────────────────

export const RECORD_FORMAT = 'repo-tree-sync/cache-record';
export const RECORD_VERSION = 1;

// Keep the literals below in step with RECORD_FORMAT / RECORD_VERSION.

const storedRecord = type({
  format: "'repo-tree-sync/cache-record'",
  version: '1',
  key: 'string',
  repository: { owner: 'string', name: 'string', ref: 'string' },
  rootContentId: 'string',
  'validator?': 'string',
  truncated: 'boolean',
  fetchedAt: 'number',
  ttl: 'number',
  entries: type({
    path: 'string',
    kind: "'file' | 'directory'",
    'size?': 'number',
    contentId: 'string',
  }).array(),
});

type StoredRecord = typeof storedRecord.infer;

export function encodeRecord(record: CacheRecord): string {
  const stored: StoredRecord = {
    format: RECORD_FORMAT,
    version: RECORD_VERSION,
    key: record.key,
    repository: { owner: record.repository.owner, name: record.repository.name, ref: record.repository.ref },
    rootContentId: record.rootContentId,
    validator: record.validator,
    truncated: record.truncated,
    fetchedAt: record.fetchedAt,
    ttl: record.ttl,
    entries: collectEntries(record.snapshot).map((entry) => ({
      path: formatPath(entry.path),
      kind: entry.kind,
      size: entry.size,
      contentId: entry.contentId,
    })),
  };
  return JSON.stringify(stored);
}

/** @throws Error describing why the text is not a usable record for `key`. */
export function decodeRecord(key: string, text: string): CacheRecord {
  const stored = storedRecord(JSON.parse(text));
  if (stored instanceof type.errors) {
    throw new Error(`Unrecognised cache record: ${stored.summary}`);
  }
  if (stored.key !== key) {
    throw new Error(`Cache record holds "${stored.key}", expected "${key}"`);
  }
  const snapshot = buildTree(
    stored.entries.map((entry) => ({
      path: splitPath(entry.path),
      kind: entry.kind,
      size: entry.size,
      contentId: entry.contentId,
    })),
  );
  return {
    key: stored.key,
    repository: Object.freeze({ ...stored.repository }),
    snapshot,
    rootContentId: stored.rootContentId,
    validator: stored.validator,
    truncated: stored.truncated,
    fetchedAt: stored.fetchedAt,
    ttl: stored.ttl,
  };
}

const FILE_NAME = /^(.+)-([0-9a-f]{8})\.json$/;

/**
 * File name for a cache key. The digest keeps keys that differ only in case
 * apart on case-insensitive filesystems.
 */
export function cacheFileName(key: string): string {
  const digest = createHash('sha256').update(key).digest('hex').slice(0, 8);
  return `${encodeURIComponent(key)}-${digest}.json`;
}

/** The key a file name was made from, or `undefined` for files this store did not write. */
function keyFromFileName(name: string): string | undefined {
  const match = FILE_NAME.exec(name);
  if (!match) return undefined;
  let key: string;
  try {
    key = decodeURIComponent(match[1]!);
  } catch (err) {
    if (err instanceof URIError) return undefined;
    throw err;
  }
  return cacheFileName(key) === name ? key : undefined;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per key under `directory`, named by {@link cacheFileName};
 * other files there are ignored. Files are written beside their target and
 * renamed into place; the file mtime doubles as the last-activity
 * clock used by `sweep`.
 */
export class FileCacheStore implements CacheStore {
  private readonly now: () => number;
  /** Last decoded record per key, reused while the file text is unchanged. */
  private readonly decoded = new Map<string, { text: string; record: CacheRecord }>();

  constructor(
    readonly directory: string,
    options: StoreOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  private fileFor(key: string): string {
    return path.join(this.directory, cacheFileName(key));
  }

  async get(key: string): Promise<CacheRecord | undefined> {
    const file = this.fileFor(key);
    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isMissing(err)) {
        this.decoded.delete(key);
        return undefined;
      }
      throw err;
    }

    const record = this.decode(key, text);
    if (!record) {
      await this.discard(key, file);
      return undefined;
    }
    await this.touch(file);
    return record;
  }

  async put(key: string, record: CacheRecord): Promise<void> {
    const file = this.fileFor(key);
    const text = encodeRecord(record);
    const temp = `${file}.${randomUUID()}.tmp`;
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(temp, text, 'utf-8');
    await fs.rename(temp, file);
    await this.touch(file);
    this.decoded.set(key, { text, record });
  }

  async delete(key: string): Promise<void> {
    this.decoded.delete(key);
    await fs.rm(this.fileFor(key), { force: true });
  }

  async sweep(maxAge: number, now = this.now()): Promise<string[]> {
    const removed: string[] = [];
    for (const { key, file } of await this.files()) {
      const record = await this.peek(key, file);
      if (record === null) continue;
      if (!record) {
        removed.push(key);
        continue;
      }
      const { mtimeMs } = await fs.stat(file);
      if (now - Math.max(record.fetchedAt, mtimeMs) > maxAge) {
        await this.delete(key);
        removed.push(key);
      }
    }
    return removed;
  }

  /** All readable records. Listing does not count as a read for `sweep`. */
  async list(): Promise<CacheRecord[]> {
    const records: CacheRecord[] = [];
    for (const { key, file } of await this.files()) {
      const record = await this.peek(key, file);
      if (record) records.push(record);
    }
    return records;
  }

  /** Decode without touching; `null` when the file vanished, `undefined` when it was corrupt and removed. */
  private async peek(key: string, file: string): Promise<CacheRecord | null | undefined> {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    const record = this.decode(key, text);
    if (!record) await this.discard(key, file);
    return record;
  }

  private async files(): Promise<Array<{ key: string; file: string }>> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    const files: Array<{ key: string; file: string }> = [];
    for (const name of names.sort()) {
      const key = keyFromFileName(name);
      if (key !== undefined) files.push({ key, file: path.join(this.directory, name) });
    }
    return files;
  }

  private decode(key: string, text: string): CacheRecord | undefined {
    const memo = this.decoded.get(key);
    if (memo?.text === text) return memo.record;
    try {
      const record = decodeRecord(key, text);
      this.decoded.set(key, { text, record });
      return record;
    } catch (err) {
      const reason = err instanceof NormalizationError ? `inconsistent snapshot (${err.message})` : err instanceof Error ? err.message : String(err);
      console.warn(`Discarding corrupt cache record ${key}: ${reason}`);
      return undefined;
    }
  }

  private async discard(key: string, file: string): Promise<void> {
    this.decoded.delete(key);
    await fs.rm(file, { force: true });
  }

  private async touch(file: string): Promise<void> {
    const at = new Date(this.now());
    await fs.utimes(file, at, at).catch((err: unknown) => {
      if (!isMissing(err)) throw err;
    });
  }
}

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FileCacheStore, MemoryCacheStore, cacheFileName, decodeRecord, encodeRecord } from '../cache-store.js';
import { buildTree, listPaths, treesEqual } from '../tree.js';
import { cacheKey, createRepositoryRef, type CacheRecord } from '../types.js';

const HOUR = 60 * 60 * 1000;

function makeRecord(name: string, fetchedAt: number): CacheRecord {
  const repository = createRepositoryRef('test-org', name, 'main');
  return {
    key: cacheKey(repository),
    repository,
    snapshot: buildTree([
      { path: ['README.md'], kind: 'file', size: 12, contentId: 'blob-readme' },
      { path: ['src', 'index.ts'], kind: 'file', contentId: 'blob-index' },
    ]),
    rootContentId: 'root-1',
    validator: '"etag-1"',
    truncated: false,
    fetchedAt,
    ttl: HOUR,
  };
}

describe('record codec', () => {
  it('restores an equal snapshot from its encoding', () => {
    const record = makeRecord('repo-a', 1_000);
    const decoded = decodeRecord(record.key, encodeRecord(record));

    expect(treesEqual(decoded.snapshot, record.snapshot)).toBe(true);
    expect(decoded.repository).toEqual({ owner: 'test-org', name: 'repo-a', ref: 'main' });
    expect(decoded.validator).toBe('"etag-1"');
    expect(decoded.fetchedAt).toBe(1_000);
  });

  it('refuses a record stored under another key', () => {
    const record = makeRecord('repo-a', 1_000);
    expect(() => decodeRecord('test-org/other@main', encodeRecord(record))).toThrow(/expected "test-org\/other@main"/);
  });

  it('refuses an unknown format version', () => {
    const record = makeRecord('repo-a', 1_000);
    const stored = { ...JSON.parse(encodeRecord(record)), version: 2 };
    expect(() => decodeRecord(record.key, JSON.stringify(stored))).toThrow(/Unrecognised cache record/);
  });
});

describe('MemoryCacheStore', () => {
  it('sweeps only records that were neither fetched nor read recently', async () => {
    let now = 0;
    const store = new MemoryCacheStore({ now: () => now });
    const idle = makeRecord('idle', 0);
    const read = makeRecord('read', 0);
    await store.put(idle.key, idle);
    await store.put(read.key, read);

    now = 20 * HOUR;
    await store.get(read.key);

    now = 30 * HOUR;
    expect(await store.sweep(24 * HOUR)).toEqual([idle.key]);
    expect(await store.get(idle.key)).toBeUndefined();
    expect(await store.get(read.key)).toBe(read);
  });
});

describe('FileCacheStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'repo-tree-sync-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns undefined for a key that was never stored', async () => {
    const store = new FileCacheStore(path.join(dir, 'missing'));
    expect(await store.get('test-org/none@main')).toBeUndefined();
    expect(await store.list()).toEqual([]);
  });

  it('persists records across store instances', async () => {
    const record = makeRecord('repo-a', Date.now());
    await new FileCacheStore(dir).put(record.key, record);

    const reopened = await new FileCacheStore(dir).get(record.key);
    expect(reopened).toBeDefined();
    expect(listPaths(reopened!.snapshot)).toEqual(['README.md', 'src', 'src/index.ts']);
    expect(reopened!.rootContentId).toBe('root-1');
    expect(reopened!.truncated).toBe(false);
  });

  it('keeps handing out the same snapshot while the file is unchanged', async () => {
    const store = new FileCacheStore(dir);
    const record = makeRecord('repo-a', Date.now());
    await store.put(record.key, record);

    const first = await store.get(record.key);
    const second = await store.get(record.key);
    expect(first?.snapshot).toBe(record.snapshot);
    expect(second?.snapshot).toBe(record.snapshot);
  });

  it('writes one file per key and leaves no temp files behind', async () => {
    const store = new FileCacheStore(dir);
    const record = makeRecord('repo-a', Date.now());
    await store.put(record.key, record);
    await store.put(record.key, { ...record, fetchedAt: record.fetchedAt + 1 });

    expect(await fs.readdir(dir)).toEqual([cacheFileName(record.key)]);
  });

  it('treats a corrupt file as absent and removes it', async () => {
    const store = new FileCacheStore(dir);
    const key = 'test-org/broken@main';
    const file = path.join(dir, cacheFileName(key));
    await fs.writeFile(file, '{"format": "repo-tree-sync/cache-rec', 'utf-8');

    expect(await store.get(key)).toBeUndefined();
    await expect(fs.access(file)).rejects.toThrow();
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining(`Discarding corrupt cache record ${key}`));
  });

  it('treats a record with an inconsistent snapshot as absent', async () => {
    const store = new FileCacheStore(dir);
    const record = makeRecord('repo-a', Date.now());
    const stored = JSON.parse(encodeRecord(record));
    stored.entries.push({ path: 'README.md/nested', kind: 'file', contentId: 'x' });
    await fs.writeFile(path.join(dir, cacheFileName(record.key)), JSON.stringify(stored), 'utf-8');

    expect(await store.get(record.key)).toBeUndefined();
  });

  it('lists every readable record', async () => {
    const store = new FileCacheStore(dir);
    const a = makeRecord('repo-a', Date.now());
    const b = makeRecord('repo-b', Date.now());
    await store.put(a.key, a);
    await store.put(b.key, b);
    await fs.writeFile(path.join(dir, 'junk.json'), 'nope', 'utf-8');

    const names = (await store.list()).map((record) => record.repository.name).sort();
    expect(names).toEqual(['repo-a', 'repo-b']);
  });

  it('ignores files it did not write', async () => {
    const store = new FileCacheStore(dir, { now: () => Date.UTC(2030, 0, 1) });
    await fs.writeFile(path.join(dir, 'notes%zz.json'), '{}', 'utf-8');
    await fs.writeFile(path.join(dir, 'notes%zz-0123abcd.json'), '{}', 'utf-8');
    await fs.writeFile(path.join(dir, 'test-org%2Frepo-a%40main-00000000.json'), '{}', 'utf-8');

    expect(await store.list()).toEqual([]);
    expect(await store.sweep(1)).toEqual([]);
    expect((await fs.readdir(dir)).sort()).toEqual([
      'notes%zz-0123abcd.json',
      'notes%zz.json',
      'test-org%2Frepo-a%40main-00000000.json',
    ]);
  });

  it('stores keys differing only in case under distinct file names', async () => {
    const store = new FileCacheStore(dir);
    const upper = { ...makeRecord('repo-a', Date.now()), key: 'test-org/repo-a@Main', rootContentId: 'root-upper' };
    const lower = { ...makeRecord('repo-a', Date.now()), key: 'test-org/repo-a@main', rootContentId: 'root-lower' };
    await store.put(upper.key, upper);
    await store.put(lower.key, lower);

    const names = await fs.readdir(dir);
    expect(new Set(names.map((name) => name.toLowerCase())).size).toBe(2);
    expect((await store.get(upper.key))?.rootContentId).toBe('root-upper');
    expect((await store.get(lower.key))?.rootContentId).toBe('root-lower');
  });

  it('deletes a record', async () => {
    const store = new FileCacheStore(dir);
    const record = makeRecord('repo-a', Date.now());
    await store.put(record.key, record);
    await store.delete(record.key);

    expect(await store.get(record.key)).toBeUndefined();
    await store.delete(record.key);
  });

  it('sweeps idle records but keeps recently read ones', async () => {
    const start = Date.UTC(2024, 0, 1);
    let now = start;
    const store = new FileCacheStore(dir, { now: () => now });
    const idle = makeRecord('idle', start);
    const read = makeRecord('read', start);
    await store.put(idle.key, idle);
    await store.put(read.key, read);

    now = start + 20 * HOUR;
    await store.get(read.key);

    now = start + 30 * HOUR;
    expect(await store.sweep(24 * HOUR)).toEqual([idle.key]);
    expect(await store.get(idle.key)).toBeUndefined();
    expect((await store.get(read.key))?.repository.name).toBe('read');
  });
});

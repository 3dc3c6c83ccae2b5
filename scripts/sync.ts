#!/usr/bin/env tsx
/**
 * scripts/sync.ts
 *
 * Warm the tree cache for every repository of an account, then sweep idle
 * records.
 *
 * Usage:
 *   GITHUB_OWNER=my-org GITHUB_TOKEN=<token> npx tsx scripts/sync.ts
 *
 * Environment variables:
 *   GITHUB_OWNER   (required) user or organisation to sync.
 *   REPO_FILTER    (optional) Regex pattern; only matching repo names are synced.
 *   FORCE_REFRESH  (optional) "1" to ignore cached validators.
 *   Plus everything read by resolveConfig (GITHUB_TOKEN, TREE_CACHE_DIR, …).
 */

import { countNodes, createTreeSync, formatRepository } from '../src/index.js';

const owner = process.env['GITHUB_OWNER'];
if (!owner) {
  console.error('Error: GITHUB_OWNER environment variable is required.');
  process.exit(1);
}

const repoFilterRaw = process.env['REPO_FILTER'];
const sync = createTreeSync();

const { repositories, warning } = await sync.syncAccount(owner, {
  forceRefresh: process.env['FORCE_REFRESH'] === '1',
  repoFilter: repoFilterRaw ? new RegExp(repoFilterRaw) : undefined,
  onProgress(p) {
    if (p.message) process.stdout.write(`\r${p.message.padEnd(80)}`);
    if (p.phase === 'done') {
      process.stdout.write('\n');
      console.log(`Done: ${p.completed} synced, ${p.failed} failed, ${p.total} total.`);
    }
  },
});

if (warning) console.warn(warning.message);

for (const { repository, result, error } of repositories) {
  if (result) {
    console.log(`${formatRepository(repository)}: ${countNodes(result.tree)} nodes (${result.source})`);
  } else if (error) {
    console.warn(`${formatRepository(repository)}: ${error.kind} – ${error.message}`);
  }
}

const removed = await sync.sweep();
console.log(`Swept ${removed.length} idle cache records.`);

import { type } from 'arktype';
import { NormalizationError } from './errors.js';
import type { EntryKind, TreeEntry, TreeNode } from './types.js';

// ── Host listing ─────────────────────────────────────────────────────────────

// Shape of GET /repos/{owner}/{repo}/git/trees/{sha}?recursive=1. Unknown keys are ignored.
const treeListing = type({
  sha: 'string',
  'truncated?': 'boolean',
  tree: type({
    path: 'string',
    type: "'blob' | 'tree' | 'commit'",
    sha: 'string',
    'size?': 'number',
  }).array(),
});

export interface TreeListing {
  /** Root tree id. */
  sha: string;
  truncated: boolean;
  entries: TreeEntry[];
}

/**
 * Validate a raw recursive tree listing and convert it into entries.
 *
 * Submodule gitlinks (`commit`) are kept as leaf files so their presence is
 * still visible to lookups.
 */
export function parseTreeListing(body: unknown): TreeListing {
  const listing = treeListing(body);
  if (listing instanceof type.errors) {
    throw new NormalizationError('malformed', '', `Malformed tree listing: ${listing.summary}`);
  }
  return {
    sha: listing.sha,
    truncated: listing.truncated ?? false,
    entries: listing.tree.map((item): TreeEntry => ({
      path: splitPath(item.path),
      kind: item.type === 'tree' ? 'directory' : 'file',
      size: item.size,
      contentId: item.sha,
    })),
  };
}

// ── Paths ────────────────────────────────────────────────────────────────────

export function splitPath(path: string): string[] {
  return path === '' ? [] : path.split('/');
}

export function formatPath(segments: readonly string[]): string {
  return segments.join('/');
}

function compareSegments(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i]! < b[i]! ? -1 : 1;
  }
  return a.length - b.length;
}

// ── Builder ──────────────────────────────────────────────────────────────────

interface DraftNode {
  name: string;
  path: string;
  kind: EntryKind;
  children: Map<string, DraftNode>;
  entry?: TreeEntry;
}

function draft(name: string, path: string, kind: EntryKind, entry?: TreeEntry): DraftNode {
  return { name, path, kind, children: new Map(), entry };
}

function sameEntry(a: TreeEntry, b: TreeEntry): boolean {
  return a.contentId === b.contentId && a.size === b.size;
}

/**
 * Build the hierarchical snapshot for a set of entries.
 *
 * The result does not depend on input order: entries are sorted segment-wise
 * before insertion and every level is ordered by name. Directories implied by
 * deeper paths are synthesized without an `entry`.
 *
 * @throws NormalizationError on an empty path, a path used both as file and
 *         directory, or two different entries for the same path.
 */
export function buildTree(entries: Iterable<TreeEntry>): TreeNode {
  const sorted = [...entries].sort((a, b) => compareSegments(a.path, b.path));
  const root = draft('', '', 'directory');

  for (const entry of sorted) {
    const fullPath = formatPath(entry.path);
    if (entry.path.length === 0 || entry.path.some((segment) => segment === '')) {
      throw new NormalizationError('empty-path', fullPath, `Tree entry has an empty path: "${fullPath}"`);
    }

    let parent = root;
    for (let depth = 0; depth < entry.path.length - 1; depth++) {
      const name = entry.path[depth]!;
      let child = parent.children.get(name);
      if (!child) {
        child = draft(name, formatPath(entry.path.slice(0, depth + 1)), 'directory');
        parent.children.set(name, child);
      } else if (child.kind !== 'directory') {
        throw new NormalizationError(
          'kind-conflict',
          child.path,
          `"${child.path}" is a file but "${fullPath}" lies beneath it`,
        );
      }
      parent = child;
    }

    // Sorting puts a directory's own entry before its contents, so an
    // existing node here always came from an earlier entry for this path.
    const name = entry.path[entry.path.length - 1]!;
    const existing = parent.children.get(name);
    if (!existing) {
      parent.children.set(name, draft(name, fullPath, entry.kind, entry));
    } else if (existing.kind !== entry.kind) {
      throw new NormalizationError(
        'kind-conflict',
        fullPath,
        `"${fullPath}" is listed as both ${existing.kind} and ${entry.kind}`,
      );
    } else if (existing.entry && !sameEntry(existing.entry, entry)) {
      throw new NormalizationError('duplicate', fullPath, `"${fullPath}" is listed twice with different content`);
    }
  }

  return freeze(root);
}

function freeze(node: DraftNode): TreeNode {
  const ordered = [...node.children.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const children = new Map<string, TreeNode>();
  for (const [name, child] of ordered) {
    children.set(name, freeze(child));
  }
  const frozen: TreeNode = node.entry
    ? { name: node.name, path: node.path, kind: node.kind, children, entry: node.entry }
    : { name: node.name, path: node.path, kind: node.kind, children };
  return Object.freeze(frozen);
}

// ── Queries ──────────────────────────────────────────────────────────────────

export function findNode(root: TreeNode, path: string | readonly string[]): TreeNode | undefined {
  const segments = typeof path === 'string' ? splitPath(path) : path;
  let node: TreeNode | undefined = root;
  for (const segment of segments) {
    node = node.children.get(segment);
    if (!node) return undefined;
  }
  return node;
}

/** Pre-order walk below `root`, excluding the root itself. */
export function* walkTree(root: TreeNode): Generator<TreeNode> {
  for (const child of root.children.values()) {
    yield child;
    yield* walkTree(child);
  }
}

export function listPaths(root: TreeNode, options: { kind?: EntryKind } = {}): string[] {
  const paths: string[] = [];
  for (const node of walkTree(root)) {
    if (!options.kind || node.kind === options.kind) paths.push(node.path);
  }
  return paths;
}

/** Number of nodes below the root: explicit entries plus synthesized directories. */
export function countNodes(root: TreeNode): number {
  let count = 0;
  for (const _node of walkTree(root)) count++;
  return count;
}

/** The explicit entries a snapshot was built from, in tree order. */
export function collectEntries(root: TreeNode): TreeEntry[] {
  const entries: TreeEntry[] = [];
  for (const node of walkTree(root)) {
    if (node.entry) entries.push(node.entry);
  }
  return entries;
}

export function treesEqual(a: TreeNode, b: TreeNode): boolean {
  if (a === b) return true;
  if (a.name !== b.name || a.path !== b.path || a.kind !== b.kind) return false;
  if (Boolean(a.entry) !== Boolean(b.entry)) return false;
  if (a.entry && b.entry && !sameEntry(a.entry, b.entry)) return false;
  if (a.children.size !== b.children.size) return false;
  const left = [...a.children.values()];
  const right = [...b.children.values()];
  return left.every((child, i) => treesEqual(child, right[i]!));
}

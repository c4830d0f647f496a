/**
 * release-patch Diff Engine — Compare two file trees and produce a structured delta.
 *
 * Design:
 *   - Identity key: the POSIX path relative to the tree root
 *   - Change detection: content fingerprint only; timestamps never matter
 *   - Delta categories: added, removed, modified (disjoint)
 *   - Ordering: code-unit order on paths, so output files are reproducible
 *     regardless of locale or filesystem listing order
 *
 * A path whose type changed between releases (file in one, directory in the
 * other) shows up as the old file Removed plus the files under the new
 * directory Added, since only regular files are keyed.
 */

import type { ChangeRecord, FileEntry, TreeDiff } from '../types/index.js';

// ─── Diff computation ────────────────────────────────────────────────

export function diffTrees(before: FileEntry[], after: FileEntry[]): TreeDiff {
  const changes = diffByKey(before, after, e => e.path, (a, b) => a.hash !== b.hash);
  changes.sort((a, b) => comparePaths(a.path, b.path));

  const added = changes.filter(c => c.kind === 'added').map(c => c.path);
  const modified = changes.filter(c => c.kind === 'modified').map(c => c.path);
  const removed = changes.filter(c => c.kind === 'removed').map(c => c.path);
  const changed = [...added, ...modified].sort(comparePaths);

  return {
    summary: {
      oldFiles: before.length,
      newFiles: after.length,
      added: added.length,
      modified: modified.length,
      removed: removed.length,
      unchanged: after.length - added.length - modified.length,
      totalChanges: changes.length,
    },
    changes,
    added,
    modified,
    removed,
    changed,
  };
}

export function hasChanges(diff: TreeDiff): boolean {
  return diff.summary.totalChanges > 0;
}

/** Plain code-unit comparison; localeCompare would vary by ICU build. */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ─── Generic key-based diff ──────────────────────────────────────────

function diffByKey(
  before: FileEntry[],
  after: FileEntry[],
  keyFn: (item: FileEntry) => string,
  changedFn: (a: FileEntry, b: FileEntry) => boolean,
): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  const beforeMap = new Map<string, FileEntry>();
  const afterMap = new Map<string, FileEntry>();

  for (const item of before) beforeMap.set(keyFn(item), item);
  for (const item of after) afterMap.set(keyFn(item), item);

  // Removed: in before but not in after
  for (const [key, item] of beforeMap) {
    if (!afterMap.has(key)) {
      changes.push({ kind: 'removed', path: key, entry: item });
    }
  }

  // Added or modified: in after
  for (const [key, item] of afterMap) {
    const prev = beforeMap.get(key);
    if (!prev) {
      changes.push({ kind: 'added', path: key, entry: item });
    } else if (changedFn(prev, item)) {
      changes.push({ kind: 'modified', path: key, entry: item, previous: prev });
    }
  }

  return changes;
}

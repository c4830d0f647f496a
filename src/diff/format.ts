/**
 * release-patch Diff — Human-readable output formatter.
 */

import type { ChangeRecord, TreeDiff } from '../types/index.js';

export interface FormatOptions {
  /** Also list every changed path under the counts */
  listFiles?: boolean;
}

export function formatTreeDiff(diff: TreeDiff, oldTag: string, newTag: string, opts: FormatOptions = {}): string {
  const lines: string[] = [];
  const s = diff.summary;

  lines.push(`Files in ${oldTag}: ${s.oldFiles}`);
  lines.push(`Files in ${newTag}: ${s.newFiles}`);

  if (s.totalChanges === 0) {
    lines.push(`No differences between ${oldTag} and ${newTag}.`);
    return lines.join('\n');
  }

  lines.push(`+${s.added} added  ~${s.modified} modified  -${s.removed} removed  (${s.unchanged} unchanged)`);

  if (opts.listFiles) {
    lines.push('');
    for (const c of diff.changes) lines.push(`  ${prefixFor(c)} ${c.path}`);
  }

  return lines.join('\n');
}

function prefixFor(c: ChangeRecord): string {
  return c.kind === 'added' ? '+' : c.kind === 'removed' ? '-' : '~';
}

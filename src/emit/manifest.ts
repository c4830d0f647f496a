/**
 * release-patch Emit — Path listings and the release summary.
 */

import type { TreeDiff } from '../types/index.js';

/** One relative path per line, trailing newline; empty list → empty string */
export function renderManifest(paths: string[]): string {
  return paths.map(p => p + '\n').join('');
}

export interface SummaryInput {
  /** Product name shown in the heading, e.g. "YOURLS" */
  title: string;
  oldTag: string;
  newTag: string;
  diff: TreeDiff;
}

/**
 * Plain-text summary suitable as a release body.
 */
export function renderSummary(input: SummaryInput): string {
  const { diff } = input;
  const s = diff.summary;
  const lines: string[] = [];

  lines.push(`# ${input.title} Patch Summary (from ${input.oldTag} version to ${input.newTag})`);
  lines.push('');
  lines.push(`Number of files in OLD: ${s.oldFiles}`);
  lines.push(`Number of files in NEW: ${s.newFiles}`);
  lines.push(`Number of files in generated patch ZIP: ${diff.changed.length}`);
  lines.push('');

  lines.push('Added files:');
  pushList(lines, diff.added);
  lines.push('');

  lines.push('Modified files:');
  pushList(lines, diff.modified);
  lines.push('');

  if (diff.removed.length > 0) {
    lines.push('Removed files:');
    pushList(lines, diff.removed);
  } else {
    lines.push('No files were removed between the two versions.');
  }

  return lines.join('\n') + '\n';
}

function pushList(lines: string[], paths: string[]): void {
  if (paths.length === 0) lines.push('(none)');
  else lines.push(...paths);
}

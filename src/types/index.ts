/**
 * release-patch — Core type definitions.
 *
 * Everything the fetch → extract → diff → emit pipeline passes between stages.
 */

// ─── Release references ──────────────────────────────────────────────

/** Sentinel accepted wherever a tag is expected; resolved through the releases API. */
export const LATEST = 'latest';

export interface ReleaseRef {
  /** Concrete tag name, e.g. "1.9.2" */
  tag: string;
  /** What the operator asked for: a tag, or the "latest" sentinel */
  requested: string;
}

export interface ReleaseInfo {
  tag: string;
  name: string | null;
  publishedAt: string | null;
  prerelease: boolean;
  draft: boolean;
}

// ─── File trees ──────────────────────────────────────────────────────

export interface FileEntry {
  /** POSIX path relative to the tree root */
  path: string;
  /** Hex SHA-256 of the file contents */
  hash: string;
  size: number;
}

export type ChangeKind = 'added' | 'modified' | 'removed';

export interface ChangeRecord {
  kind: ChangeKind;
  path: string;
  entry: FileEntry;
  previous?: FileEntry;   // Only for 'modified'
}

export interface TreeDiffSummary {
  oldFiles: number;
  newFiles: number;
  added: number;
  modified: number;
  removed: number;
  unchanged: number;
  totalChanges: number;
}

export interface TreeDiff {
  summary: TreeDiffSummary;
  /** All records, sorted by path */
  changes: ChangeRecord[];
  added: string[];
  modified: string[];
  removed: string[];
  /** added ∪ modified, sorted: the patch archive contents */
  changed: string[];
}

// ─── Outputs ─────────────────────────────────────────────────────────

export type OutputKind = 'archive' | 'manifest' | 'removed' | 'summary' | 'deploy-script' | 'winscp-script';

export interface OutputFile {
  kind: OutputKind;
  path: string;
}

export interface OutputPaths {
  archive: string;
  manifest: string;
  removed: string;
  summary: string;
  deployScript: string;
  winscpScript: string;
}

export interface DeployTarget {
  targetDir: string;
  user: string;
  host: string;
}

export type PatchStatus = 'written' | 'identical-tags' | 'no-changes' | 'nothing-removed';

export interface PatchResult {
  status: PatchStatus;
  oldTag: string;
  newTag: string;
  diff?: TreeDiff;
  outputs: OutputFile[];
}

/**
 * release-patch Diff — File tree scanning.
 * Walks an extracted release and fingerprints every regular file.
 */

import fg from 'fast-glob';
import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ScanError } from '../errors/index.js';
import { comparePaths, diffTrees } from './engine.js';
import type { FileEntry, TreeDiff } from '../types/index.js';

/** Hex SHA-256 of a file's bytes */
export function fingerprint(content: Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * List every regular file under root (dotfiles included, symlinks not
 * followed), sorted by path.
 */
export async function scanTree(root: string): Promise<FileEntry[]> {
  try {
    const files = await fg('**/*', {
      cwd: root,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      suppressErrors: false,
    });

    const entries: FileEntry[] = [];
    for (const path of files.sort(comparePaths)) {
      const content = await readFile(join(root, path));
      entries.push({ path, hash: fingerprint(content), size: content.byteLength });
    }
    return entries;
  } catch (err) {
    throw new ScanError(root, { cause: err });
  }
}

export async function compareTrees(oldRoot: string, newRoot: string): Promise<TreeDiff> {
  const [before, after] = [await scanTree(oldRoot), await scanTree(newRoot)];
  return diffTrees(before, after);
}

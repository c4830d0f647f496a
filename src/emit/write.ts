/**
 * release-patch Emit — Filesystem writes for text outputs.
 */

import { chmod, mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { OutputWriteError } from '../errors/index.js';

export async function writeTextOutput(path: string, content: string, mode?: number): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
    // writeFile's mode only applies on creation; chmod covers overwrites
    if (mode !== undefined) await chmod(path, mode);
  } catch (err) {
    throw new OutputWriteError(path, { cause: err });
  }
}

/**
 * Create <backupDir>/<parent> for each removed path so WinSCP's `get` can
 * download into it.
 */
export async function prepareBackupDirs(backupDir: string, removed: string[]): Promise<void> {
  const dirs = new Set<string>([backupDir]);
  for (const rel of removed) dirs.add(dirname(join(backupDir, rel)));

  for (const dir of dirs) {
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new OutputWriteError(dir, { cause: err });
    }
  }
}

/**
 * release-patch Archive — Extraction into a working tree.
 *
 * Source archives from GitHub wrap everything in a single "<repo>-<tag>/"
 * directory. The returned root skips that wrapper so both releases compare
 * path-for-path even though their wrapper names differ.
 */

import { unzipSync } from 'fflate';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';
import { ExtractionError, errorMessage } from '../errors/index.js';

/**
 * Unpack a zip into destDir and return the tree root to compare.
 * Throws ExtractionError for corrupt or empty archives and for entries
 * that would land outside destDir.
 */
export async function extractArchive(bytes: Uint8Array, destDir: string): Promise<string> {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(bytes);
  } catch (err) {
    throw new ExtractionError(`Archive is corrupt or not a zip file: ${errorMessage(err)}`, { cause: err });
  }

  const base = resolve(destDir);
  const files = Object.entries(entries)
    .map(([name, data]) => ({ name: normalizeEntryName(name), data }))
    .filter(f => !f.name.endsWith('/'));

  if (files.length === 0) {
    throw new ExtractionError('Archive contains no files');
  }

  // Validate every entry before touching the disk
  const targets = files.map(f => ({ target: safeTarget(base, f.name), data: f.data }));

  try {
    await mkdir(base, { recursive: true });
    for (const { target, data } of targets) {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, data);
    }
  } catch (err) {
    throw new ExtractionError(`Cannot unpack archive into ${base}: ${errorMessage(err)}`, { cause: err });
  }

  const wrapper = singleTopLevelDir(files.map(f => f.name));
  return wrapper ? join(base, wrapper) : base;
}

/**
 * The one directory every entry lives under, or null when the archive has
 * several top-level entries or files directly at its top level.
 */
export function singleTopLevelDir(names: string[]): string | null {
  let top: string | null = null;
  for (const name of names) {
    const slash = name.indexOf('/');
    if (slash === -1) return null;           // a file at the top level
    const first = name.slice(0, slash);
    if (top === null) top = first;
    else if (top !== first) return null;
  }
  return top;
}

// ─── Helpers ─────────────────────────────────────────────────────────

function normalizeEntryName(name: string): string {
  return name.replace(/\\/g, '/').replace(/^\.\//, '');
}

function safeTarget(base: string, name: string): string {
  if (name.startsWith('/') || /^[A-Za-z]:/.test(name)) {
    throw new ExtractionError(`Archive entry has an absolute path: ${name}`);
  }
  const target = resolve(base, name);
  if (target !== base && !target.startsWith(base + sep)) {
    throw new ExtractionError(`Archive entry escapes the extraction directory: ${name}`);
  }
  return target;
}

/**
 * release-patch Archive — Patch package builder.
 */

import { Zip, ZipDeflate, unzipSync } from 'fflate';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { OutputWriteError } from '../errors/index.js';
import { comparePaths } from '../diff/index.js';

/**
 * Fixed entry timestamp so the same file set always zips to the same bytes.
 * DOS time starts at 1980; built from local fields because that is what the
 * zip header stores.
 */
export const ZIP_MTIME = new Date(1980, 0, 1);

export interface BuiltArchive {
  path: string;
  entries: number;
  bytes: number;
}

/**
 * Zip exactly `paths` (relative to root) into outputPath. No directory
 * entries are written; an empty path list gives a valid empty zip.
 */
export async function buildPatchArchive(root: string, paths: string[], outputPath: string): Promise<BuiltArchive> {
  const sorted = [...paths].sort(comparePaths);
  const files: Array<[string, Uint8Array]> = [];
  for (const rel of sorted) {
    try {
      files.push([rel, await readFile(join(root, rel))]);
    } catch (err) {
      throw new OutputWriteError(outputPath, { cause: err });
    }
  }

  const zipped = zipInOrder(files);

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, zipped);
  } catch (err) {
    throw new OutputWriteError(outputPath, { cause: err });
  }

  return { path: outputPath, entries: sorted.length, bytes: zipped.byteLength };
}

/**
 * Entries are added one by one through the streaming writer; a plain
 * Zippable object would put integer-like names ("9", "10") first.
 */
function zipInOrder(files: Array<[string, Uint8Array]>): Uint8Array {
  const chunks: Uint8Array[] = [];
  const failures: Error[] = [];
  const zip = new Zip((err, chunk) => {
    if (err) failures.push(err);
    else chunks.push(chunk);
  });

  for (const [name, data] of files) {
    const entry = new ZipDeflate(name, { level: 6 });
    entry.mtime = ZIP_MTIME;
    zip.add(entry);
    entry.push(data, true);
  }
  zip.end();
  if (failures.length > 0) throw failures[0];

  const out = new Uint8Array(chunks.reduce((n, c) => n + c.byteLength, 0));
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/** Entry names in central directory order, directories included (they end with "/"). */
export function listArchiveEntries(bytes: Uint8Array): string[] {
  const names: string[] = [];
  unzipSync(bytes, {
    filter: file => {
      names.push(file.name);
      return false;
    },
  });
  return names;
}

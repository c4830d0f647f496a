/**
 * release-patch Emit — Output file naming.
 *
 *   <prefix>-update-<old>-to-<new>.zip               patch archive
 *   <prefix>-update-<old>-to-<new>.txt               manifest
 *   <prefix>-update-<old>-to-<new>.removed.txt       removed listing
 *   <prefix>-update-<old>-to-<new>.summary.txt       summary
 *   <prefix>-update-<old>-to-<new>.removed.winscp.txt
 *   <prefix>-deploy-<old>-to-<new>.sh                next to the archive
 *
 * With an explicit --output the archive path is taken as given and the
 * text files hang off it with its extension dropped.
 */

import { basename, dirname, extname, join, resolve } from 'node:path';
import type { OutputPaths } from '../types/index.js';

export interface OutputNameOptions {
  prefix: string;
  oldTag: string;
  newTag: string;
  /** --output value; relative paths resolve against cwd */
  output?: string;
  cwd: string;
}

export function outputPaths(opts: OutputNameOptions): OutputPaths {
  const oldPart = fileSafe(opts.oldTag);
  const newPart = fileSafe(opts.newTag);

  const archive = resolve(opts.cwd, opts.output ?? `${opts.prefix}-update-${oldPart}-to-${newPart}.zip`);
  const ext = extname(archive);
  const base = ext ? archive.slice(0, -ext.length) : archive;

  return {
    archive,
    manifest: `${base}.txt`,
    removed: `${base}.removed.txt`,
    summary: `${base}.summary.txt`,
    winscpScript: `${base}.removed.winscp.txt`,
    deployScript: join(dirname(archive), `${opts.prefix}-deploy-${oldPart}-to-${newPart}.sh`),
  };
}

/** Name as referenced from the deploy script, which runs beside its outputs */
export function localName(path: string): string {
  return basename(path);
}

/** Tags like "release/2.0" must not introduce directories into file names */
export function fileSafe(tag: string): string {
  return tag.replace(/[\\/:*?"<>|\s]+/g, '-');
}

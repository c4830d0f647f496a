/**
 * release-patch Pipeline — one end-to-end run.
 *
 * resolve tags → download old → download new → extract both → compare →
 * write outputs. Everything downloaded or unpacked lives in one temp
 * directory that is removed when the run ends, however it ends.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { UsageError } from '../errors/index.js';
import { resolveReleasePair, type ReleaseSource } from '../fetch/index.js';
import { extractArchive, buildPatchArchive } from '../archive/index.js';
import { compareTrees, formatTreeDiff, hasChanges } from '../diff/index.js';
import {
  outputPaths, localName,
  renderManifest, renderSummary, renderDeployScript, renderWinScpScript,
  writeTextOutput, prepareBackupDirs,
} from '../emit/index.js';
import type { Reporter } from '../log/index.js';
import { LATEST, type DeployTarget, type OutputFile, type OutputPaths, type PatchResult, type TreeDiff } from '../types/index.js';

export interface PatchOptions {
  oldTag: string;
  /** Omitted or "latest" → newest published release */
  newTag?: string;
  /** Archive path; other outputs derive from it */
  output?: string;
  /** Base for relative output paths */
  cwd: string;
  /** File name prefix and summary title */
  prefix: string;
  summary: boolean;
  onlyRemoved: boolean;
  winscp: boolean;
  deploy: DeployTarget;
  /** WinSCP download folder; defaults to removed_backup/ beside the outputs */
  backupDir?: string;
  /** Report every changed path, not just counts */
  listFiles?: boolean;
}

export interface PatchContext {
  source: ReleaseSource;
  reporter: Reporter;
  /** Parent for the working directory; defaults to the OS temp dir */
  tmpRoot?: string;
}

const SCRIPT_MODE = 0o755;

export async function createPatch(opts: PatchOptions, ctx: PatchContext): Promise<PatchResult> {
  const { source, reporter } = ctx;

  if (opts.oldTag.trim() === '') throw new UsageError('--old must name a release tag');
  if (opts.winscp && !opts.onlyRemoved) throw new UsageError('--winscp requires --only-removed');

  const { old: oldRef, new: newRef } = await resolveReleasePair(source, opts.oldTag, opts.newTag);
  if (newRef.requested === LATEST) {
    reporter.step(`No target version specified, using latest: ${newRef.tag}`);
  }

  const base = { oldTag: oldRef.tag, newTag: newRef.tag };
  if (oldRef.tag === newRef.tag) {
    reporter.warn(`Old tag '${oldRef.tag}' and new tag '${newRef.tag}' are identical. Nothing to do.`);
    return { ...base, status: 'identical-tags', outputs: [] };
  }

  const paths = outputPaths({ prefix: opts.prefix, oldTag: oldRef.tag, newTag: newRef.tag, output: opts.output, cwd: opts.cwd });
  const workDir = await mkdtemp(join(ctx.tmpRoot ?? tmpdir(), 'release-patch-'));

  try {
    const oldRoot = await fetchAndExtract(source, oldRef.tag, join(workDir, 'old'), reporter);
    const newRoot = await fetchAndExtract(source, newRef.tag, join(workDir, 'new'), reporter);

    reporter.step('Comparing directories…');
    const diff = await compareTrees(oldRoot, newRoot);
    for (const line of formatTreeDiff(diff, oldRef.tag, newRef.tag, { listFiles: opts.listFiles }).split('\n')) {
      reporter.detail(line);
    }

    if (opts.onlyRemoved) {
      return await emitRemovedOnly(opts, paths, diff, base, reporter);
    }

    if (!hasChanges(diff)) {
      reporter.success('No differences found. Nothing written.');
      return { ...base, status: 'no-changes', diff, outputs: [] };
    }

    const outputs = await emitFull(opts, paths, diff, newRoot, base, reporter);
    return { ...base, status: 'written', diff, outputs };
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

// ─── Stages ──────────────────────────────────────────────────────────

async function fetchAndExtract(source: ReleaseSource, tag: string, dest: string, reporter: Reporter): Promise<string> {
  reporter.step(`Downloading ${tag} from ${source.repo}`);
  const bytes = await source.downloadArchive(tag);
  reporter.detail(`${formatBytes(bytes.byteLength)} received`);
  return extractArchive(bytes, dest);
}

async function emitFull(
  opts: PatchOptions,
  paths: OutputPaths,
  diff: TreeDiff,
  newRoot: string,
  tags: { oldTag: string; newTag: string },
  reporter: Reporter,
): Promise<OutputFile[]> {
  const outputs: OutputFile[] = [];
  const hasRemoved = diff.removed.length > 0;

  await writeTextOutput(paths.manifest, renderManifest(diff.changed));
  outputs.push({ kind: 'manifest', path: paths.manifest });
  reporter.success(`Manifest saved to ${paths.manifest}`);

  if (hasRemoved) {
    await writeTextOutput(paths.removed, renderManifest(diff.removed));
    outputs.push({ kind: 'removed', path: paths.removed });
    reporter.success(`Removed files found, list saved to ${paths.removed}`);
  }

  reporter.step(`Creating package ${paths.archive}`);
  const built = await buildPatchArchive(newRoot, diff.changed, paths.archive);
  outputs.push({ kind: 'archive', path: paths.archive });
  reporter.success(`Package contains ${built.entries} file(s)`);

  const script = renderDeployScript({
    ...tags,
    archiveName: localName(paths.archive),
    manifestName: localName(paths.manifest),
    removedName: hasRemoved ? localName(paths.removed) : undefined,
    target: opts.deploy,
    onlyRemoved: false,
  });
  await writeTextOutput(paths.deployScript, script, SCRIPT_MODE);
  outputs.push({ kind: 'deploy-script', path: paths.deployScript });
  reporter.success(`Deployment script generated: ${paths.deployScript}`);

  if (opts.summary) {
    await writeTextOutput(paths.summary, renderSummary({ title: opts.prefix, ...tags, diff }));
    outputs.push({ kind: 'summary', path: paths.summary });
    reporter.success(`Release summary saved to ${paths.summary}`);
  }

  return outputs;
}

async function emitRemovedOnly(
  opts: PatchOptions,
  paths: OutputPaths,
  diff: TreeDiff,
  tags: { oldTag: string; newTag: string },
  reporter: Reporter,
): Promise<PatchResult> {
  if (diff.removed.length === 0) {
    reporter.success(`No files to remove from ${tags.oldTag} to ${tags.newTag}.`);
    return { ...tags, status: 'nothing-removed', diff, outputs: [] };
  }

  const outputs: OutputFile[] = [];

  await writeTextOutput(paths.removed, renderManifest(diff.removed));
  outputs.push({ kind: 'removed', path: paths.removed });
  reporter.success(`Removed files found, list saved to ${paths.removed}`);

  const script = renderDeployScript({
    ...tags,
    archiveName: localName(paths.archive),
    manifestName: localName(paths.manifest),
    removedName: localName(paths.removed),
    target: opts.deploy,
    onlyRemoved: true,
  });
  await writeTextOutput(paths.deployScript, script, SCRIPT_MODE);
  outputs.push({ kind: 'deploy-script', path: paths.deployScript });
  reporter.success(`Deployment script generated: ${paths.deployScript}`);

  if (opts.winscp) {
    const backupDir = opts.backupDir ?? join(dirname(paths.archive), 'removed_backup');
    await prepareBackupDirs(backupDir, diff.removed);
    await writeTextOutput(paths.winscpScript, renderWinScpScript({ removed: diff.removed, target: opts.deploy, backupDir }));
    outputs.push({ kind: 'winscp-script', path: paths.winscpScript });
    reporter.success(`WinSCP script generated: ${paths.winscpScript}`);
    reporter.detail(`Backup folder prepared at: ${backupDir}`);
  }

  return { ...tags, status: 'written', diff, outputs };
}

function formatBytes(n: number): string {
  if (n < 1024) return `${n} B`;
  if (n < 1024 * 1024) return `${(n / 1024).toFixed(1)} KiB`;
  return `${(n / (1024 * 1024)).toFixed(1)} MiB`;
}

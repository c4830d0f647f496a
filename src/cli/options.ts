/**
 * release-patch CLI — Flag validation and mapping onto pipeline options.
 * Kept apart from the commander program so it can be exercised without
 * parsing process.argv.
 */

import { CommanderError, InvalidArgumentError } from 'commander';
import { PatchError, UsageError, STEP_LABELS, errorMessage } from '../errors/index.js';
import type { ResolvedConfig } from '../config/index.js';
import type { PatchOptions } from '../pipeline/index.js';
import type { ReleaseInfo } from '../types/index.js';

export interface CreateFlags {
  old: string;
  new?: string;
  output?: string;
  /** false when --no-verify is given */
  verify: boolean;
  summary?: boolean;
  onlyRemoved?: boolean;
  winscp?: boolean;
  repo?: string;
  listFiles?: boolean;
  quiet?: boolean;
}

export function validateCreateFlags(flags: CreateFlags): void {
  if (flags.winscp && !flags.onlyRemoved) {
    throw new UsageError('--winscp requires --only-removed');
  }
  if (flags.old.trim() === '') {
    throw new UsageError('--old must name a release tag');
  }
}

export function toPatchOptions(flags: CreateFlags, config: ResolvedConfig, cwd: string): PatchOptions {
  validateCreateFlags(flags);
  return {
    oldTag: flags.old.trim(),
    newTag: flags.new,
    output: flags.output,
    cwd,
    prefix: config.outputPrefix,
    summary: flags.summary ?? false,
    onlyRemoved: flags.onlyRemoved ?? false,
    winscp: flags.winscp ?? false,
    deploy: config.deploy,
    backupDir: config.backupDir,
    listFiles: flags.listFiles ?? false,
  };
}

/** commander argument parser for --limit */
export function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > 100) {
    throw new InvalidArgumentError('Expected a whole number between 1 and 100.');
  }
  return n;
}

/** One `releases` row: tag, publish date and any prerelease/draft flags, tab separated */
export function formatReleaseLine(r: ReleaseInfo): string {
  const flags = [r.prerelease ? 'prerelease' : '', r.draft ? 'draft' : ''].filter(Boolean).join(',');
  return [r.tag, r.publishedAt ?? '-', flags].filter(Boolean).join('\t');
}

// ─── Failures ────────────────────────────────────────────────────────

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Process exit code for a failed run. Commander's own parse errors count as
 * usage errors; its help and version exits keep their 0.
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : EXIT_USAGE;
  if (err instanceof UsageError) return EXIT_USAGE;
  return EXIT_FAILURE;
}

export function formatFailure(err: unknown): string {
  if (err instanceof PatchError) return `✗ ${STEP_LABELS[err.step]} failed: ${err.message}`;
  return `✗ ${errorMessage(err)}`;
}

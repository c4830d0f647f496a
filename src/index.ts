/**
 * release-patch — Library entry point.
 *
 * Usage:
 *   import { createPatch, GitHubReleaseSource, createConsoleReporter } from 'release-patch';
 *   import { compareTrees, buildPatchArchive } from 'release-patch';
 *   import type { TreeDiff, PatchResult } from 'release-patch';
 */

export * from './types/index.js';
export * from './errors/index.js';
export { createPatch } from './pipeline/index.js';
export type { PatchOptions, PatchContext } from './pipeline/index.js';
export { GitHubReleaseSource, resolveReleaseRef, resolveReleasePair, isLatest, buildArchiveUrl } from './fetch/index.js';
export type { ReleaseSource, GitHubSourceOptions, HttpFetch } from './fetch/index.js';
export { extractArchive, buildPatchArchive, listArchiveEntries } from './archive/index.js';
export type { BuiltArchive } from './archive/index.js';
export { diffTrees, compareTrees, scanTree, fingerprint, formatTreeDiff } from './diff/index.js';
export {
  outputPaths, renderManifest, renderSummary, renderDeployScript, renderWinScpScript,
} from './emit/index.js';
export { resolveConfig, DEFAULT_CONFIG } from './config/index.js';
export type { ResolvedConfig, ConfigFile } from './config/index.js';
export { createConsoleReporter, silentReporter } from './log/index.js';
export type { Reporter } from './log/index.js';

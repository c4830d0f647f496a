/**
 * release-patch Diff — exports.
 */

export { diffTrees, hasChanges, comparePaths } from './engine.js';
export { scanTree, compareTrees, fingerprint } from './tree.js';
export { formatTreeDiff, type FormatOptions } from './format.js';

/**
 * release-patch Archive — exports.
 */

export { extractArchive, singleTopLevelDir } from './extract.js';
export { buildPatchArchive, listArchiveEntries, ZIP_MTIME, type BuiltArchive } from './build.js';

/**
 * release-patch Fetch — exports and release reference resolution.
 */

import { LATEST, type ReleaseRef } from '../types/index.js';
import type { ReleaseSource } from './github.js';

export { GitHubReleaseSource, buildArchiveUrl, type ReleaseSource, type GitHubSourceOptions, type HttpFetch } from './github.js';

export function isLatest(requested: string | undefined): boolean {
  return requested === undefined || requested.trim() === '' || requested.toLowerCase() === LATEST;
}

/**
 * Resolve a tag request to a concrete tag. Only "latest" (or nothing) costs a
 * round trip; anything else is taken as given.
 */
export async function resolveReleaseRef(source: ReleaseSource, requested: string | undefined): Promise<ReleaseRef> {
  if (isLatest(requested)) {
    return { tag: await source.resolveLatestTag(), requested: LATEST };
  }
  const tag = (requested ?? '').trim();
  return { tag, requested: tag };
}

/**
 * Resolve both ends of a patch. The new side defaults to the latest release;
 * "latest" is looked up at most once even when both sides ask for it.
 */
export async function resolveReleasePair(
  source: ReleaseSource,
  oldTag: string,
  newTag?: string,
): Promise<{ old: ReleaseRef; new: ReleaseRef }> {
  const newRef = await resolveReleaseRef(source, newTag);
  const oldRef = isLatest(oldTag) && newRef.requested === LATEST
    ? newRef
    : await resolveReleaseRef(source, oldTag);
  return { old: oldRef, new: newRef };
}

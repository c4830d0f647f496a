import { mkdtempSync, mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { strToU8, zipSync, type Zippable } from 'fflate';
import { FetchError, TagResolutionError } from '../src/errors/index.js';
import type { ReleaseSource } from '../src/fetch/index.js';
import type { ReleaseInfo } from '../src/types/index.js';

export function tempDir(label = 'test'): string {
  return mkdtempSync(join(tmpdir(), `release-patch-${label}-`));
}

/** Write { relPath: content } under root */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = join(root, rel);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content);
  }
}

/**
 * Zip { relPath: content }, optionally inside a wrapper directory the way
 * GitHub tag archives are laid out (with its own directory entry).
 */
export function makeZip(files: Record<string, string>, wrapper?: string): Uint8Array {
  const z: Zippable = {};
  if (wrapper) z[wrapper] = {};
  for (const [rel, content] of Object.entries(files)) {
    z[wrapper ? `${wrapper}/${rel}` : rel] = strToU8(content);
  }
  return zipSync(z);
}

/** In-memory release host */
export class FakeReleaseSource implements ReleaseSource {
  readonly repo = 'acme/widget';
  readonly downloads: string[] = [];
  private readonly archives: Record<string, Uint8Array>;
  private readonly latest?: string;

  constructor(archives: Record<string, Uint8Array>, latest?: string) {
    this.archives = archives;
    this.latest = latest;
  }

  async resolveLatestTag(): Promise<string> {
    if (!this.latest) throw new TagResolutionError('no published release');
    return this.latest;
  }

  async downloadArchive(tag: string): Promise<Uint8Array> {
    this.downloads.push(tag);
    const archive = this.archives[tag];
    if (!archive) {
      throw new FetchError(`Archive for tag ${tag} not found`, `https://example.test/${tag}.zip`, 404);
    }
    return archive;
  }

  async listReleases(limit: number): Promise<ReleaseInfo[]> {
    return Object.keys(this.archives).slice(0, limit).map(tag => ({
      tag, name: tag, publishedAt: null, prerelease: false, draft: false,
    }));
  }
}

/** Await a promise that must reject with `type`, and return the error. */
export async function rejectionOf<E>(promise: Promise<unknown>, type: new (...args: never[]) => E): Promise<E> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected a ${type.name} rejection`);
}

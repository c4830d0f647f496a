import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { strFromU8, strToU8, unzipSync, zipSync } from 'fflate';
import { extractArchive, singleTopLevelDir } from '../src/archive/extract.js';
import { buildPatchArchive, listArchiveEntries } from '../src/archive/build.js';
import { ExtractionError, OutputWriteError } from '../src/errors/index.js';
import { makeZip, rejectionOf, tempDir, writeTree } from './helpers.js';

const dirs: string[] = [];
function scratch(): string {
  const dir = tempDir('archive');
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
});

// ─── Extraction ──────────────────────────────────────────────────────

describe('extractArchive', () => {
  it('returns the wrapper directory as tree root', async () => {
    const dest = join(scratch(), 'old');
    const zip = makeZip({ 'index.php': '<?php', 'includes/load.php': 'load' }, 'widget-1.0');

    const root = await extractArchive(zip, dest);

    expect(root).toBe(join(dest, 'widget-1.0'));
    expect(readFileSync(join(root, 'includes/load.php'), 'utf-8')).toBe('load');
  });

  it('uses the destination itself when files sit at the top level', async () => {
    const dest = join(scratch(), 'new');
    const zip = makeZip({ 'README.md': 'r', 'src/a.ts': 'a' });

    const root = await extractArchive(zip, dest);

    expect(root).toBe(dest);
    expect(readFileSync(join(dest, 'README.md'), 'utf-8')).toBe('r');
  });

  it('rejects data that is not a zip', async () => {
    const junk = strToU8('not a zip file '.repeat(10));
    await expect(extractArchive(junk, join(scratch(), 'x'))).rejects.toBeInstanceOf(ExtractionError);
  });

  it('rejects an archive without files', async () => {
    await expect(extractArchive(zipSync({}), join(scratch(), 'x'))).rejects.toThrow('Archive contains no files');
  });

  it('refuses entries that escape the destination', async () => {
    const base = scratch();
    const zip = zipSync({ 'ok.txt': strToU8('fine'), '../evil.txt': strToU8('boom') });

    await expect(extractArchive(zip, join(base, 'dest'))).rejects.toThrow('escapes the extraction directory');
    expect(existsSync(join(base, 'evil.txt'))).toBe(false);
    expect(existsSync(join(base, 'dest', 'ok.txt'))).toBe(false);
  });
});

describe('singleTopLevelDir', () => {
  it('finds the shared wrapper', () => {
    expect(singleTopLevelDir(['w/a.txt', 'w/b/c.txt'])).toBe('w');
  });

  it('returns null for mixed top levels', () => {
    expect(singleTopLevelDir(['w/a.txt', 'v/b.txt'])).toBeNull();
    expect(singleTopLevelDir(['w/a.txt', 'top.txt'])).toBeNull();
  });
});

// ─── Building ────────────────────────────────────────────────────────

describe('buildPatchArchive', () => {
  it('contains exactly the requested files, no directory entries', async () => {
    const root = scratch();
    writeTree(root, { 'a.txt': 'A', 'sub/c.txt': 'C', 'unchanged.txt': 'U' });
    const out = join(scratch(), 'patch.zip');

    const built = await buildPatchArchive(root, ['sub/c.txt', 'a.txt'], out);

    expect(built.entries).toBe(2);
    const files = unzipSync(readFileSync(out));
    expect(Object.keys(files)).toEqual(['a.txt', 'sub/c.txt']);
    expect(strFromU8(files['sub/c.txt'])).toBe('C');
  });

  it('orders numeric names by code unit like every other path', async () => {
    const root = scratch();
    writeTree(root, { '9': 'nine', '10': 'ten', 'a.txt': 'A' });
    const out = join(scratch(), 'patch.zip');

    await buildPatchArchive(root, ['9', 'a.txt', '10'], out);

    expect(listArchiveEntries(readFileSync(out))).toEqual(['10', '9', 'a.txt']);
  });

  it('reports a changed file that cannot be read back as a write failure', async () => {
    const out = join(scratch(), 'patch.zip');

    const err = await rejectionOf(buildPatchArchive(scratch(), ['missing.txt'], out), OutputWriteError);

    expect(err.step).toBe('write');
    expect(err.path).toBe(out);
    expect(existsSync(out)).toBe(false);
  });

  it('writes a valid empty archive for an empty change set', async () => {
    const out = join(scratch(), 'empty.zip');

    const built = await buildPatchArchive(scratch(), [], out);

    expect(built.entries).toBe(0);
    expect(listArchiveEntries(readFileSync(out))).toEqual([]);
  });

  it('produces identical bytes for identical input', async () => {
    const root = scratch();
    writeTree(root, { 'x.php': 'x', 'y/z.php': 'z' });
    const out = scratch();

    await buildPatchArchive(root, ['x.php', 'y/z.php'], join(out, 'one.zip'));
    await buildPatchArchive(root, ['y/z.php', 'x.php'], join(out, 'two.zip'));

    expect(readFileSync(join(out, 'one.zip')).equals(readFileSync(join(out, 'two.zip')))).toBe(true);
  });

  it('reports an unwritable output path', async () => {
    const root = scratch();
    writeTree(root, { 'a.txt': 'A' });
    const blocker = join(scratch(), 'blocker');
    writeFileSync(blocker, 'a file, not a directory');

    await expect(buildPatchArchive(root, ['a.txt'], join(blocker, 'patch.zip'))).rejects.toBeInstanceOf(OutputWriteError);
  });
});

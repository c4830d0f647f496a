import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, readdirSync, readFileSync, rmSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { strFromU8, strToU8, unzipSync } from 'fflate';
import { createPatch, type PatchOptions } from '../src/pipeline/index.js';
import { silentReporter } from '../src/log/index.js';
import { ExtractionError, FetchError, UsageError } from '../src/errors/index.js';
import { FakeReleaseSource, makeZip, tempDir } from './helpers.js';

const dirs: string[] = [];
function scratch(label: string): string {
  const dir = tempDir(label);
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const d of dirs.splice(0)) rmSync(d, { recursive: true, force: true });
});

const deploy = { targetDir: '/srv/www/widget', user: 'deployer', host: 'web.example.test' };

function options(cwd: string, overrides: Partial<PatchOptions> = {}): PatchOptions {
  return {
    oldTag: '1.0',
    newTag: '1.1',
    cwd,
    prefix: 'widget',
    summary: false,
    onlyRemoved: false,
    winscp: false,
    deploy,
    ...overrides,
  };
}

function release(files: Record<string, string>, tag: string): Uint8Array {
  return makeZip(files, `widget-${tag}`);
}

// ─── Full package ────────────────────────────────────────────────────

describe('createPatch', () => {
  it('packages added and modified files with manifest, script and summary', async () => {
    const cwd = scratch('out');
    const tmpRoot = scratch('work');
    const source = new FakeReleaseSource({
      '1.0': release({ 'a.txt': '1', 'b.txt': '2' }, '1.0'),
      '1.1': release({ 'a.txt': '1', 'b.txt': '3', 'c.txt': '4' }, '1.1'),
    });

    const result = await createPatch(options(cwd, { summary: true }), { source, reporter: silentReporter, tmpRoot });

    expect(result.status).toBe('written');
    expect(result.diff?.modified).toEqual(['b.txt']);
    expect(result.diff?.added).toEqual(['c.txt']);
    expect(result.diff?.removed).toEqual([]);
    expect(result.outputs.map(o => o.kind)).toEqual(['manifest', 'archive', 'deploy-script', 'summary']);

    expect(readFileSync(join(cwd, 'widget-update-1.0-to-1.1.txt'), 'utf-8')).toBe('b.txt\nc.txt\n');
    expect(existsSync(join(cwd, 'widget-update-1.0-to-1.1.removed.txt'))).toBe(false);

    const zipped = unzipSync(readFileSync(join(cwd, 'widget-update-1.0-to-1.1.zip')));
    expect(Object.keys(zipped)).toEqual(['b.txt', 'c.txt']);
    expect(strFromU8(zipped['b.txt'])).toBe('3');

    const script = join(cwd, 'widget-deploy-1.0-to-1.1.sh');
    expect(statSync(script).mode & 0o777).toBe(0o755);
    expect(readFileSync(script, 'utf-8')).toContain('REMOVED_MANIFEST=""');

    expect(readFileSync(join(cwd, 'widget-update-1.0-to-1.1.summary.txt'), 'utf-8'))
      .toContain('Number of files in generated patch ZIP: 2');

    expect(readdirSync(tmpRoot)).toEqual([]);
  });

  it('lists removed files but never packages them', async () => {
    const cwd = scratch('out');
    const source = new FakeReleaseSource({
      '1.0': release({ 'keep.php': 'k', 'old/legacy.php': 'l' }, '1.0'),
      '1.1': release({ 'keep.php': 'k2', 'new.php': 'n' }, '1.1'),
    });

    const result = await createPatch(options(cwd), { source, reporter: silentReporter });

    expect(result.outputs.map(o => o.kind)).toEqual(['manifest', 'removed', 'archive', 'deploy-script']);
    expect(readFileSync(join(cwd, 'widget-update-1.0-to-1.1.removed.txt'), 'utf-8')).toBe('old/legacy.php\n');
    const zipped = unzipSync(readFileSync(join(cwd, 'widget-update-1.0-to-1.1.zip')));
    expect(Object.keys(zipped)).toEqual(['keep.php', 'new.php']);
    expect(readFileSync(join(cwd, 'widget-deploy-1.0-to-1.1.sh'), 'utf-8'))
      .toContain('REMOVED_MANIFEST="widget-update-1.0-to-1.1.removed.txt"');
  });

  it('resolves an omitted new tag to the latest release', async () => {
    const cwd = scratch('out');
    const source = new FakeReleaseSource({
      '1.0': release({ 'a.txt': '1' }, '1.0'),
      '2.0': release({ 'a.txt': '2' }, '2.0'),
    }, '2.0');

    const result = await createPatch(options(cwd, { newTag: undefined }), { source, reporter: silentReporter });

    expect(result.newTag).toBe('2.0');
    expect(source.downloads).toEqual(['1.0', '2.0']);
    expect(existsSync(join(cwd, 'widget-update-1.0-to-2.0.zip'))).toBe(true);
  });

  it('does nothing when both tags are the same', async () => {
    const cwd = scratch('out');
    const source = new FakeReleaseSource({ '1.0': release({ 'a.txt': '1' }, '1.0') }, '1.0');

    const result = await createPatch(options(cwd, { newTag: 'latest' }), { source, reporter: silentReporter });

    expect(result.status).toBe('identical-tags');
    expect(source.downloads).toEqual([]);
    expect(readdirSync(cwd)).toEqual([]);
  });

  it('writes nothing when the releases have identical content', async () => {
    const cwd = scratch('out');
    const source = new FakeReleaseSource({
      '1.0': release({ 'a.txt': '1', 'b/c.txt': 'c' }, '1.0'),
      '1.1': release({ 'a.txt': '1', 'b/c.txt': 'c' }, '1.1'),
    });

    const result = await createPatch(options(cwd), { source, reporter: silentReporter });

    expect(result.status).toBe('no-changes');
    expect(result.diff?.changes).toEqual([]);
    expect(result.outputs).toEqual([]);
    expect(readdirSync(cwd)).toEqual([]);
  });

  it('honours an explicit output path', async () => {
    const cwd = scratch('out');
    const source = new FakeReleaseSource({
      '1.0': release({ 'a.txt': '1' }, '1.0'),
      '1.1': release({ 'a.txt': '2' }, '1.1'),
    });

    const result = await createPatch(options(cwd, { output: 'dist/patch.zip' }), { source, reporter: silentReporter });

    expect(result.outputs.map(o => o.path)).toEqual([
      join(cwd, 'dist', 'patch.txt'),
      join(cwd, 'dist', 'patch.zip'),
      join(cwd, 'dist', 'widget-deploy-1.0-to-1.1.sh'),
    ]);
  });
});

// ─── Removed-only mode ───────────────────────────────────────────────

describe('createPatch with onlyRemoved', () => {
  const archives = () => ({
    '1.0': release({ 'a.php': 'a', 'admin/old.php': 'o', 'js/legacy.js': 'l' }, '1.0'),
    '1.1': release({ 'a.php': 'a2', 'added.php': 'n' }, '1.1'),
  });

  it('writes the removed listing and deletion script but no archive', async () => {
    const cwd = scratch('out');
    const source = new FakeReleaseSource(archives());

    const result = await createPatch(options(cwd, { onlyRemoved: true }), { source, reporter: silentReporter });

    expect(result.outputs.map(o => o.kind)).toEqual(['removed', 'deploy-script']);
    expect(readFileSync(join(cwd, 'widget-update-1.0-to-1.1.removed.txt'), 'utf-8')).toBe('admin/old.php\njs/legacy.js\n');
    expect(existsSync(join(cwd, 'widget-update-1.0-to-1.1.zip'))).toBe(false);
    expect(existsSync(join(cwd, 'widget-update-1.0-to-1.1.txt'))).toBe(false);

    const script = readFileSync(join(cwd, 'widget-deploy-1.0-to-1.1.sh'), 'utf-8');
    expect(script).not.toContain('rsync');
    expect(script).toContain('REMOVED_MANIFEST="widget-update-1.0-to-1.1.removed.txt"');
  });

  it('adds a WinSCP script and prepares the backup folders', async () => {
    const cwd = scratch('out');
    const source = new FakeReleaseSource(archives());

    const result = await createPatch(options(cwd, { onlyRemoved: true, winscp: true }), { source, reporter: silentReporter });

    expect(result.outputs.map(o => o.kind)).toEqual(['removed', 'deploy-script', 'winscp-script']);
    const backup = join(cwd, 'removed_backup');
    expect(statSync(join(backup, 'admin')).isDirectory()).toBe(true);
    expect(statSync(join(backup, 'js')).isDirectory()).toBe(true);

    const lines = readFileSync(join(cwd, 'widget-update-1.0-to-1.1.removed.winscp.txt'), 'utf-8').split('\n');
    expect(lines[4]).toBe(`lcd ${backup}`);
    expect(lines.slice(5, 9)).toEqual([
      'get "admin/old.php" "admin/old.php"',
      'get "js/legacy.js" "js/legacy.js"',
      'rm "admin/old.php"',
      'rm "js/legacy.js"',
    ]);
  });

  it('reports nothing to remove', async () => {
    const cwd = scratch('out');
    const source = new FakeReleaseSource({
      '1.0': release({ 'a.php': 'a' }, '1.0'),
      '1.1': release({ 'a.php': 'a', 'b.php': 'b' }, '1.1'),
    });

    const result = await createPatch(options(cwd, { onlyRemoved: true }), { source, reporter: silentReporter });

    expect(result.status).toBe('nothing-removed');
    expect(readdirSync(cwd)).toEqual([]);
  });

  it('rejects --winscp without --only-removed before downloading', async () => {
    const source = new FakeReleaseSource(archives());

    await expect(createPatch(options(scratch('out'), { winscp: true }), { source, reporter: silentReporter }))
      .rejects.toBeInstanceOf(UsageError);
    expect(source.downloads).toEqual([]);
  });
});

// ─── Failures ────────────────────────────────────────────────────────

describe('createPatch failures', () => {
  it('cleans the working directory when extraction fails', async () => {
    const tmpRoot = scratch('work');
    const source = new FakeReleaseSource({
      '1.0': release({ 'a.txt': '1' }, '1.0'),
      '1.1': strToU8('this is an HTML error page, not a zip '.repeat(4)),
    });

    await expect(createPatch(options(scratch('out')), { source, reporter: silentReporter, tmpRoot }))
      .rejects.toBeInstanceOf(ExtractionError);
    expect(readdirSync(tmpRoot)).toEqual([]);
  });

  it('cleans the working directory when a download fails', async () => {
    const tmpRoot = scratch('work');
    const source = new FakeReleaseSource({ '1.0': release({ 'a.txt': '1' }, '1.0') });

    await expect(createPatch(options(scratch('out')), { source, reporter: silentReporter, tmpRoot }))
      .rejects.toBeInstanceOf(FetchError);
    expect(source.downloads).toEqual(['1.0', '1.1']);
    expect(readdirSync(tmpRoot)).toEqual([]);
  });
});

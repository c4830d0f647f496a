#!/usr/bin/env node

/**
 * release-patch CLI
 *
 * Usage:
 *   release-patch --old <tag> [--new <tag>]   Build the update package (default command)
 *   release-patch releases [-n 2]             List the newest published releases
 *
 * Exit codes: 0 success (including "nothing to do"), 1 failed step, 2 usage error.
 */

import { Command, CommanderError } from 'commander';
import gradient from 'gradient-string';
import { resolveConfig, describeConfigSource, type ResolvedConfig } from '../config/index.js';
import { GitHubReleaseSource } from '../fetch/index.js';
import { createPatch } from '../pipeline/index.js';
import { createConsoleReporter, silentReporter, C, type Reporter } from '../log/index.js';
import {
  toPatchOptions, validateCreateFlags, parseLimit, formatReleaseLine, exitCodeFor, formatFailure,
  type CreateFlags,
} from './options.js';

const program = new Command();

const BANNER = `
 ┬─┐┌─┐┬  ┌─┐┌─┐┌─┐┌─┐   ┌─┐┌─┐┌┬┐┌─┐┬ ┬
 ├┬┘├┤ │  ├┤ ├─┤└─┐├┤ ───├─┘├─┤ │ │  ├─┤
 ┴└─└─┘┴─┘└─┘┴ ┴└─┘└─┘   ┴  ┴ ┴ ┴ └─┘┴ ┴
`;

program
  .name('release-patch')
  .description('Build a minimal update package (changed files, manifests, deploy scripts) between two tagged releases')
  .version('1.0.0')
  .addHelpText('before', gradient(['#00ff41', '#00d4ff'])(BANNER))
  // Parse errors surface as CommanderError so they map to the usage exit code
  .exitOverride();

// ─── create ──────────────────────────────────────────────────────────

program
  .command('create', { isDefault: true })
  .description('Compare two releases and write the patch archive, manifests and deploy scripts')
  .requiredOption('--old <tag>', 'Tag of the starting release (e.g. 1.8.10)')
  .option('--new <tag>', 'Tag of the target release (default: latest)')
  .option('--output <path>', 'Output ZIP path (default: <prefix>-update-OLD-to-NEW.zip)')
  .option('--no-verify', 'Disable TLS certificate verification (not recommended)')
  .option('--summary', 'Also write a .summary.txt with patch details (e.g. for release notes)')
  .option('--only-removed', 'Only write the removed-files listing and a deletion script')
  .option('--winscp', 'Also write a WinSCP script that backs up then deletes removed files (requires --only-removed)')
  .option('--repo <owner/name>', 'Repository to fetch releases from (default: from config)')
  .option('--list-files', 'Print every changed path, not only the counts')
  .option('-q, --quiet', 'Only print the written file paths')
  .action(async (opts: CreateFlags) => {
    await run(async () => {
      validateCreateFlags(opts);
      const reporter = opts.quiet ? silentReporter : createConsoleReporter();
      const config = loadConfig(opts.repo, reporter);
      const source = openSource(config, opts.verify, reporter);

      try {
        const result = await createPatch(toPatchOptions(opts, config, process.cwd()), { source, reporter });

        for (const o of result.outputs) console.log(o.path);

        const archive = result.outputs.find(o => o.kind === 'archive');
        const script = result.outputs.find(o => o.kind === 'deploy-script');
        if (archive) {
          reporter.success(`All set: upload ${archive.path} and review the manifest for the list of changed files.`);
        }
        if (script) {
          reporter.detail(`Run ${script.path} (optionally with --dry-run) to deploy over rsync/ssh.`);
        }
      } finally {
        await source.close();
      }
    });
  });

// ─── releases ────────────────────────────────────────────────────────

program
  .command('releases')
  .description('List the newest published releases, newest first (the first two are a ready --new/--old pair)')
  .option('-n, --limit <n>', 'Number of releases to list', parseLimit, 2)
  .option('--repo <owner/name>', 'Repository to query (default: from config)')
  .option('--no-verify', 'Disable TLS certificate verification (not recommended)')
  .option('--json', 'Output as JSON')
  .action(async (opts: { limit: number; repo?: string; verify: boolean; json?: boolean }) => {
    await run(async () => {
      const reporter = opts.json ? silentReporter : createConsoleReporter();
      const config = loadConfig(opts.repo, reporter);
      const source = openSource(config, opts.verify, reporter);

      try {
        const releases = await source.listReleases(opts.limit);
        if (opts.json) {
          console.log(JSON.stringify(releases, null, 2));
          return;
        }
        if (releases.length === 0) {
          reporter.warn(`${config.repo} has no published releases.`);
          return;
        }
        for (const r of releases) console.log(formatReleaseLine(r));
      } finally {
        await source.close();
      }
    });
  });

try {
  await program.parseAsync(process.argv);
} catch (err) {
  // commander has already printed its own message
  if (!(err instanceof CommanderError)) console.error(C.error(formatFailure(err)));
  process.exitCode = exitCodeFor(err);
}

// ─── Helpers ─────────────────────────────────────────────────────────

function loadConfig(repo: string | undefined, reporter: Reporter): ResolvedConfig {
  const config = resolveConfig({ overrides: repo ? { repo } : undefined });
  reporter.detail(`Repository ${config.repo} (config: ${describeConfigSource(config)})`);
  return config;
}

function openSource(config: ResolvedConfig, verifyTls: boolean, reporter: Reporter): GitHubReleaseSource {
  if (verifyTls) {
    reporter.step('TLS verification is enabled.');
  } else {
    reporter.warn('TLS verification is disabled (not recommended).');
  }
  return new GitHubReleaseSource({
    repo: config.repo,
    apiBaseUrl: config.apiBaseUrl,
    archiveUrlTemplate: config.archiveUrlTemplate,
    token: config.token,
    verifyTls,
  });
}

async function run(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (err) {
    console.error(C.error(formatFailure(err)));
    process.exitCode = exitCodeFor(err);
  }
}

/**
 * release-patch — Configuration resolution.
 *
 * Resolution order (highest to lowest priority):
 *   1. CLI flags (--repo), never persisted
 *   2. RELEASE_PATCH_* env vars (GITHUB_TOKEN accepted for the token)
 *   3. Project config: <cwd>/.release-patch/config.json
 *   4. Global config: ~/.config/release-patch/config.json
 *   5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { DeployTarget } from '../types/index.js';

// ─── Schema ──────────────────────────────────────────────────────────

const REPO_PATTERN = /^[\w.-]+\/[\w.-]+$/;

export const ConfigFileSchema = z.object({
  repo: z.string().regex(REPO_PATTERN, 'expected "owner/name"').optional(),
  apiBaseUrl: z.string().url().optional(),
  archiveUrlTemplate: z.string().includes('{tag}', { message: 'must contain a {tag} placeholder' }).optional(),
  token: z.string().min(1).optional(),
  outputPrefix: z.string().min(1).optional(),
  backupDir: z.string().min(1).optional(),
  deploy: z.object({
    targetDir: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
  }).strict().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ResolvedConfig {
  repo: string;
  apiBaseUrl: string;
  archiveUrlTemplate: string;
  token?: string;
  /** File name prefix, e.g. "YOURLS" → YOURLS-update-1.9-to-1.10.zip */
  outputPrefix: string;
  backupDir?: string;
  deploy: DeployTarget;
  /** Config files that contributed, lowest priority first */
  sources: string[];
}

export const DEFAULT_CONFIG = {
  repo: 'YOURLS/YOURLS',
  apiBaseUrl: 'https://api.github.com',
  archiveUrlTemplate: 'https://github.com/{repo}/archive/refs/tags/{tag}.zip',
  deploy: {
    targetDir: '/var/www/yourls',
    user: 'user',
    host: 'yourserver.com',
  },
} as const;

const CONFIG_DIR = '.release-patch';
const CONFIG_FILE = 'config.json';

// ─── Config file paths ───────────────────────────────────────────────

/** Project-level config: <cwd>/.release-patch/config.json */
export function projectConfigPath(cwd: string): string {
  return join(cwd, CONFIG_DIR, CONFIG_FILE);
}

/** Global config: ~/.config/release-patch/config.json */
export function globalConfigPath(home: string = homedir()): string {
  return join(home, '.config', 'release-patch', CONFIG_FILE);
}

// ─── Loading ─────────────────────────────────────────────────────────

export function loadConfigFile(path: string): ConfigFile | null {
  if (!existsSync(path)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError('not valid JSON', path, { cause: err });
  }
  return validate(raw, path);
}

/** Map RELEASE_PATCH_* variables onto the config file shape. */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigFile {
  const layer = {
    repo: nonEmpty(env.RELEASE_PATCH_REPO),
    apiBaseUrl: nonEmpty(env.RELEASE_PATCH_API_URL),
    token: nonEmpty(env.RELEASE_PATCH_TOKEN) ?? nonEmpty(env.GITHUB_TOKEN),
    deploy: {
      targetDir: nonEmpty(env.RELEASE_PATCH_TARGET_DIR),
      user: nonEmpty(env.RELEASE_PATCH_REMOTE_USER),
      host: nonEmpty(env.RELEASE_PATCH_REMOTE_HOST),
    },
  };
  return validate(layer, 'environment');
}

export interface ResolveConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
  /** Values from CLI flags */
  overrides?: ConfigFile;
}

export function resolveConfig(opts: ResolveConfigOptions = {}): ResolvedConfig {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const sources: string[] = [];
  const layers: ConfigFile[] = [];

  for (const path of [globalConfigPath(opts.home), projectConfigPath(cwd)]) {
    const file = loadConfigFile(path);
    if (file) {
      layers.push(file);
      sources.push(path);
    }
  }
  layers.push(configFromEnv(env));
  if (opts.overrides) layers.push(validate(opts.overrides, 'command line'));

  const merged = mergeLayers(layers);
  const repo = merged.repo ?? DEFAULT_CONFIG.repo;

  return {
    repo,
    apiBaseUrl: (merged.apiBaseUrl ?? DEFAULT_CONFIG.apiBaseUrl).replace(/\/+$/, ''),
    archiveUrlTemplate: merged.archiveUrlTemplate ?? DEFAULT_CONFIG.archiveUrlTemplate,
    token: merged.token,
    outputPrefix: merged.outputPrefix ?? repoName(repo),
    backupDir: merged.backupDir,
    deploy: {
      targetDir: merged.deploy?.targetDir ?? DEFAULT_CONFIG.deploy.targetDir,
      user: merged.deploy?.user ?? DEFAULT_CONFIG.deploy.user,
      host: merged.deploy?.host ?? DEFAULT_CONFIG.deploy.host,
    },
    sources,
  };
}

/** "owner/name" → "name" */
export function repoName(repo: string): string {
  const slash = repo.indexOf('/');
  return slash === -1 ? repo : repo.slice(slash + 1);
}

/** Where the effective config came from, for display */
export function describeConfigSource(config: ResolvedConfig): string {
  return config.sources.length > 0 ? config.sources.join(', ') : 'defaults';
}

// ─── Helpers ─────────────────────────────────────────────────────────

function validate(raw: unknown, origin: string): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(issues, origin);
  }
  return result.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/** Later layers win; undefined never overwrites a value. */
function mergeLayers(layers: ConfigFile[]): ConfigFile {
  const merged: ConfigFile = {};
  for (const layer of layers) {
    if (layer.repo !== undefined) merged.repo = layer.repo;
    if (layer.apiBaseUrl !== undefined) merged.apiBaseUrl = layer.apiBaseUrl;
    if (layer.archiveUrlTemplate !== undefined) merged.archiveUrlTemplate = layer.archiveUrlTemplate;
    if (layer.token !== undefined) merged.token = layer.token;
    if (layer.outputPrefix !== undefined) merged.outputPrefix = layer.outputPrefix;
    if (layer.backupDir !== undefined) merged.backupDir = layer.backupDir;
    if (layer.deploy) {
      const deploy = { ...merged.deploy };
      if (layer.deploy.targetDir !== undefined) deploy.targetDir = layer.deploy.targetDir;
      if (layer.deploy.user !== undefined) deploy.user = layer.deploy.user;
      if (layer.deploy.host !== undefined) deploy.host = layer.deploy.host;
      merged.deploy = deploy;
    }
  }
  return merged;
}

/**
 * release-patch Fetch — GitHub releases client.
 *
 * Talks to two endpoints:
 *   - REST API  {apiBaseUrl}/repos/{owner}/{name}/releases[/latest]
 *   - Tag archive download (archiveUrlTemplate, e.g. github.com/{repo}/archive/refs/tags/{tag}.zip)
 *
 * Uses undici's fetch so TLS verification can be switched off per client
 * with a dedicated Agent instead of the process-wide NODE_TLS_REJECT_UNAUTHORIZED.
 */

import { Agent, fetch as undiciFetch } from 'undici';
import { z } from 'zod';
import { FetchError, TagResolutionError, errorMessage } from '../errors/index.js';
import type { ReleaseInfo } from '../types/index.js';

export type HttpFetch = typeof undiciFetch;
type HttpResponse = Awaited<ReturnType<HttpFetch>>;

export interface ReleaseSource {
  /** "owner/name" */
  readonly repo: string;
  resolveLatestTag(): Promise<string>;
  downloadArchive(tag: string): Promise<Uint8Array>;
  /** Newest first */
  listReleases(limit: number): Promise<ReleaseInfo[]>;
}

export interface GitHubSourceOptions {
  repo: string;
  apiBaseUrl: string;
  archiveUrlTemplate: string;
  token?: string;
  /** false = accept any certificate (not recommended) */
  verifyTls: boolean;
  /** Injected for tests; defaults to undici's fetch */
  fetch?: HttpFetch;
}

const USER_AGENT = 'release-patch';

// ─── Response schemas ────────────────────────────────────────────────

const LatestReleaseSchema = z.object({
  tag_name: z.string().min(1),
});

const ReleaseListSchema = z.array(z.object({
  tag_name: z.string().min(1),
  name: z.string().nullable().optional(),
  published_at: z.string().nullable().optional(),
  prerelease: z.boolean().optional(),
  draft: z.boolean().optional(),
}));

// ─── Client ──────────────────────────────────────────────────────────

export class GitHubReleaseSource implements ReleaseSource {
  readonly repo: string;
  private readonly apiBaseUrl: string;
  private readonly archiveUrlTemplate: string;
  private readonly token?: string;
  private readonly fetchImpl: HttpFetch;
  private readonly dispatcher?: Agent;

  constructor(opts: GitHubSourceOptions) {
    this.repo = opts.repo;
    this.apiBaseUrl = opts.apiBaseUrl.replace(/\/+$/, '');
    this.archiveUrlTemplate = opts.archiveUrlTemplate;
    this.token = opts.token;
    this.fetchImpl = opts.fetch ?? undiciFetch;
    if (!opts.verifyTls) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    }
  }

  archiveUrl(tag: string): string {
    return buildArchiveUrl(this.archiveUrlTemplate, this.repo, tag);
  }

  async resolveLatestTag(): Promise<string> {
    const url = `${this.apiBaseUrl}/repos/${this.repo}/releases/latest`;

    let res: HttpResponse;
    try {
      res = await this.request(url, true);
    } catch (err) {
      throw new TagResolutionError(`Cannot reach ${hostOf(url)} to look up the latest release: ${networkReason(err)}`, { cause: err });
    }
    if (!res.ok) {
      const hint = res.status === 404 ? ` (does ${this.repo} have any published release?)` : '';
      throw new TagResolutionError(`Latest release lookup returned ${res.status} ${res.statusText}${hint}`);
    }

    const parsed = LatestReleaseSchema.safeParse(await readJson(res));
    if (!parsed.success) {
      throw new TagResolutionError(`Latest release response from ${url} has no tag_name`);
    }
    return parsed.data.tag_name;
  }

  async downloadArchive(tag: string): Promise<Uint8Array> {
    const url = this.archiveUrl(tag);

    let res: HttpResponse;
    try {
      res = await this.request(url, false);
    } catch (err) {
      throw new FetchError(`Cannot reach ${hostOf(url)}: ${networkReason(err)}`, url, undefined, { cause: err });
    }
    if (!res.ok) {
      const what = res.status === 404 ? `Archive for tag ${tag} not found` : `Download of ${tag} failed`;
      throw new FetchError(`${what}: GET ${url} returned ${res.status} ${res.statusText}`.trimEnd(), url, res.status);
    }

    try {
      return new Uint8Array(await res.arrayBuffer());
    } catch (err) {
      throw new FetchError(`Download of ${tag} was interrupted: ${networkReason(err)}`, url, res.status, { cause: err });
    }
  }

  async listReleases(limit: number): Promise<ReleaseInfo[]> {
    const url = `${this.apiBaseUrl}/repos/${this.repo}/releases?per_page=${limit}`;

    let res: HttpResponse;
    try {
      res = await this.request(url, true);
    } catch (err) {
      throw new FetchError(`Cannot reach ${hostOf(url)}: ${networkReason(err)}`, url, undefined, { cause: err });
    }
    if (!res.ok) {
      throw new FetchError(`Release listing returned ${res.status} ${res.statusText}`.trimEnd(), url, res.status);
    }

    const parsed = ReleaseListSchema.safeParse(await readJson(res));
    if (!parsed.success) {
      throw new FetchError(`Unexpected release listing format from ${url}`, url, res.status);
    }
    return parsed.data.slice(0, limit).map(r => ({
      tag: r.tag_name,
      name: r.name ?? null,
      publishedAt: r.published_at ?? null,
      prerelease: r.prerelease ?? false,
      draft: r.draft ?? false,
    }));
  }

  /** Release pooled connections (only the insecure agent holds any of its own). */
  async close(): Promise<void> {
    if (this.dispatcher) await this.dispatcher.close();
  }

  private request(url: string, api: boolean): Promise<HttpResponse> {
    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    if (api) {
      headers.Accept = 'application/vnd.github+json';
      if (this.token) headers.Authorization = `Bearer ${this.token}`;
    }
    return this.fetchImpl(url, { headers, dispatcher: this.dispatcher, redirect: 'follow' });
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

export function buildArchiveUrl(template: string, repo: string, tag: string): string {
  const slash = repo.indexOf('/');
  const owner = slash === -1 ? repo : repo.slice(0, slash);
  const name = slash === -1 ? repo : repo.slice(slash + 1);
  return template
    .replaceAll('{repo}', repo)
    .replaceAll('{owner}', owner)
    .replaceAll('{name}', name)
    .replaceAll('{tag}', encodeURIComponent(tag));
}

/** Body as JSON, or undefined when it does not parse (the schema check then rejects it). */
async function readJson(res: HttpResponse): Promise<unknown> {
  try {
    return await res.json();
  } catch {
    return undefined;
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/** undici reports "fetch failed" and hides the socket error in `cause`. */
function networkReason(err: unknown): string {
  if (err instanceof Error && err.cause !== undefined) return errorMessage(err.cause);
  return errorMessage(err);
}

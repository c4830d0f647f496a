/**
 * release-patch — Error kinds.
 *
 * Every failure carries the pipeline step it came from so the CLI can say
 * which stage broke. Nothing here retries.
 */

export type FailureStep = 'usage' | 'config' | 'resolve' | 'fetch' | 'extract' | 'compare' | 'write';

export const STEP_LABELS: Record<FailureStep, string> = {
  usage: 'Usage',
  config: 'Configuration',
  resolve: 'Tag resolution',
  fetch: 'Download',
  extract: 'Extraction',
  compare: 'Comparison',
  write: 'Writing output',
};

export class PatchError extends Error {
  public readonly step: FailureStep;

  constructor(message: string, step: FailureStep, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PatchError';
    this.step = step;
  }
}

export class UsageError extends PatchError {
  constructor(message: string) {
    super(message, 'usage');
    this.name = 'UsageError';
  }
}

export class ConfigError extends PatchError {
  public readonly file?: string;

  constructor(message: string, file?: string, options?: { cause?: unknown }) {
    super(file ? `${file}: ${message}` : message, 'config', options);
    this.name = 'ConfigError';
    this.file = file;
  }
}

export class TagResolutionError extends PatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'resolve', options);
    this.name = 'TagResolutionError';
  }
}

export class FetchError extends PatchError {
  public readonly url: string;
  /** HTTP status, absent when the host could not be reached */
  public readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(message, 'fetch', options);
    this.name = 'FetchError';
    this.url = url;
    this.status = status;
  }
}

export class ExtractionError extends PatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'extract', options);
    this.name = 'ExtractionError';
  }
}

export class ScanError extends PatchError {
  public readonly root: string;

  constructor(root: string, options?: { cause?: unknown }) {
    super(`Cannot scan ${root}${describeCause(options?.cause)}`, 'compare', options);
    this.name = 'ScanError';
    this.root = root;
  }
}

export class OutputWriteError extends PatchError {
  public readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Cannot write ${path}${describeCause(options?.cause)}`, 'write', options);
    this.name = 'OutputWriteError';
    this.path = path;
  }
}

/** Pull a short reason out of an arbitrary thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return '';
  return `: ${errorMessage(cause)}`;
}

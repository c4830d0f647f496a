/**
 * release-patch — Progress reporting.
 *
 * Progress goes to stderr so stdout stays clean for the output paths and
 * release listings that scripts consume.
 */

import chalk from 'chalk';

export interface Reporter {
  /** A pipeline step starting: "→ Downloading 1.9.2" */
  step(message: string): void;
  /** Indented secondary line under the current step */
  detail(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  step:    chalk.cyan,
  detail:  chalk.dim,
  success: chalk.green,
  warn:    chalk.yellow,
  error:   chalk.red,
  bold:    chalk.bold,
};

type Writer = (line: string) => void;

export function createConsoleReporter(write: Writer = line => console.error(line)): Reporter {
  return {
    step: message => write(`${C.step('→')} ${message}`),
    detail: message => write(C.detail(`   ${message}`)),
    success: message => write(`${C.success('✓')} ${message}`),
    warn: message => write(`${C.warn('⚠')}  ${C.warn(message)}`),
  };
}

export const silentReporter: Reporter = {
  step: () => {},
  detail: () => {},
  success: () => {},
  warn: () => {},
};

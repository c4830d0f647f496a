/**
 * release-patch Emit — WinSCP batch script for removed files.
 * Downloads each removed file into a local backup folder first, then deletes
 * it from the server, so the operator keeps a copy of what went away.
 */

import type { DeployTarget } from '../types/index.js';

export interface WinScpScriptInput {
  removed: string[];
  target: DeployTarget;
  /** Local folder the removed files are downloaded into */
  backupDir: string;
}

export function renderWinScpScript(input: WinScpScriptInput): string {
  const { target } = input;
  const paths = input.removed.map(p => p.replace(/\\/g, '/'));
  const lines: string[] = [
    'option batch on',
    'option confirm off',
    `open sftp://${target.user}@${target.host}/`,
    `cd ${winscpArg(target.targetDir)}`,
    `lcd ${winscpArg(input.backupDir)}`,
  ];

  for (const p of paths) lines.push(`get ${quote(p)} ${quote(p)}`);
  for (const p of paths) lines.push(`rm ${quote(p)}`);

  lines.push('close', 'exit');
  return lines.join('\n') + '\n';
}

/** WinSCP escapes a double quote inside a quoted argument by doubling it */
function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

function winscpArg(value: string): string {
  return /[\s"]/.test(value) ? quote(value) : value;
}

/**
 * release-patch Emit — Bash deployment script.
 *
 * The script is meant to run from the directory holding the patch outputs:
 * it unzips the archive, rsyncs each manifest path to the server and deletes
 * each removed path over ssh. `--dry-run` as first argument makes rsync
 * simulate and turns deletions into echo lines.
 */

import type { DeployTarget } from '../types/index.js';

export interface DeployScriptInput {
  oldTag: string;
  newTag: string;
  /** File names as seen from the script's directory */
  archiveName: string;
  manifestName: string;
  /** Absent when nothing was removed */
  removedName?: string;
  target: DeployTarget;
  /** Only emit the removal half */
  onlyRemoved: boolean;
}

export function renderDeployScript(input: DeployScriptInput): string {
  const t = input.target;
  const lines: string[] = [
    '#!/bin/bash',
    '',
    `# Deployment script generated by release-patch (${input.oldTag} -> ${input.newTag})`,
    '# Update the variables below before running.',
    '',
    ...requireCommands(input.onlyRemoved ? ['ssh'] : ['ssh', 'rsync', 'unzip']),
    '',
    `REMOVED_MANIFEST=${bashString(input.removedName ?? '')}`,
    `TARGET_DIR=${bashString(t.targetDir)}      # <-- Update this with your server's path`,
    `REMOTE_USER=${bashString(t.user)}      # <-- Update with your SSH user`,
    `REMOTE_HOST=${bashString(t.host)}      # <-- Update with your server hostname or IP`,
    '',
    '# Pass --dry-run as first argument to simulate the deploy',
    'DRYRUN=""',
    'if [ "$1" == "--dry-run" ]; then',
    '  DRYRUN="--dry-run"',
    '  echo "Running in DRY-RUN mode. No files will be copied or deleted."',
    'fi',
    '',
  ];

  if (input.onlyRemoved) {
    lines.push(...removalBlock());
  } else {
    lines.push(
      `ZIP_FILE=${bashString(input.archiveName)}`,
      `MANIFEST=${bashString(input.manifestName)}`,
      'TEMP_DIR="./__deploy_temp"',
      '',
      '# Clean and unzip the patch',
      'rm -rf "$TEMP_DIR"',
      'mkdir -p "$TEMP_DIR"',
      'unzip -q "$ZIP_FILE" -d "$TEMP_DIR"',
      'echo "→ Files extracted into $TEMP_DIR"',
      '',
      '# Upload changed/added files ("/./" tells rsync to recreate the relative path)',
      'echo "→ Uploading changed files..."',
      'while IFS= read -r file; do',
      '  [ -z "$file" ] && continue',
      '  rsync -avz --relative $DRYRUN "$TEMP_DIR/./$file" "$REMOTE_USER@$REMOTE_HOST:$TARGET_DIR/"',
      'done < "$MANIFEST"',
      '',
      ...removalBlock(),
      '',
      '# Clean up',
      'rm -rf "$TEMP_DIR"',
    );
  }

  lines.push('echo "Deployment completed!"');
  return lines.join('\n') + '\n';
}

function requireCommands(commands: string[]): string[] {
  const lines: string[] = [];
  for (const cmd of commands) {
    lines.push(
      `# Check if ${cmd} is installed`,
      `if ! command -v ${cmd} >/dev/null 2>&1; then`,
      `  echo "Error: ${cmd} is not installed or not found in PATH."`,
      '  exit 1',
      'fi',
    );
  }
  return lines;
}

function removalBlock(): string[] {
  return [
    '# Remove deleted files from remote (if any)',
    'if [[ -n "$REMOVED_MANIFEST" && -f "$REMOVED_MANIFEST" ]]; then',
    '  echo "→ Removing obsolete files..."',
    '  while IFS= read -r file; do',
    '    [ -z "$file" ] && continue',
    '    if [ -n "$DRYRUN" ]; then',
    '      echo "would remove $TARGET_DIR/$file"',
    '    else',
    '      ssh "$REMOTE_USER@$REMOTE_HOST" "rm -f \'$TARGET_DIR/$file\'"',
    '    fi',
    '  done < "$REMOVED_MANIFEST"',
    'fi',
  ];
}

/** Double-quoted bash literal with $, `, " and \ escaped */
export function bashString(value: string): string {
  return `"${value.replace(/[\\"$`]/g, ch => `\\${ch}`)}"`;
}

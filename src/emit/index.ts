/**
 * release-patch Emit — exports.
 */

export { outputPaths, localName, fileSafe, type OutputNameOptions } from './paths.js';
export { renderManifest, renderSummary, type SummaryInput } from './manifest.js';
export { renderDeployScript, bashString, type DeployScriptInput } from './deploy-script.js';
export { renderWinScpScript, type WinScpScriptInput } from './winscp.js';
export { writeTextOutput, prepareBackupDirs } from './write.js';

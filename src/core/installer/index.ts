/**
 * Component installer exports barrel file.
 */
export { ComponentInstaller, parseStackChoice } from './engine.js';
export type { ComponentInstallerOptions } from './engine.js';
export { createReport, summarizeOutcomes, installed, skipped, failed } from './outcomes.js';
export { validateItemName } from './validation.js';
export { getInstallationStatus, PROJECT_INSTRUCTIONS_FILE } from './status.js';
export { readSettingsFile, formatDenySnippet, hasHooksSection } from './settings.js';
export type {
  InstallOutcome,
  InstallReport,
  InstallStatus,
  InstallationStatus,
  ReportSummary,
  SkipReason,
} from './types.js';

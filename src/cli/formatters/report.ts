/**
 * Human-readable output for installer reports.
 */
import * as path from 'node:path';
import chalk from 'chalk';
import type { ComponentName } from '../../core/catalog/types.js';
import { summarizeOutcomes } from '../../core/installer/outcomes.js';
import type { InstallOutcome, InstallReport, InstallationStatus } from '../../core/installer/types.js';
import { logger as log } from '../../utils/logger.js';

export type OutcomeLevel = 'success' | 'warn' | 'fail' | 'info';

export interface OutcomeLine {
  level: OutcomeLevel;
  message: string;
}

/** Singular noun for one item of each component. */
export const ITEM_LABELS: Readonly<Record<ComponentName, string>> = {
  skills: 'skill',
  agents: 'agent',
  hooks: 'hook',
  rules: 'rule',
  precommit: 'pre-commit file',
  security: 'security file',
  stack: 'stack file',
};

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Turn one outcome into a status line. Paths are shown relative to the target.
 */
export function describeOutcome(outcome: InstallOutcome, label: string, targetRoot: string): OutcomeLine {
  const relative = path.relative(targetRoot, outcome.destination);

  switch (outcome.status) {
    case 'installed':
      return { level: 'success', message: `Installed ${label}: ${outcome.item}` };
    case 'skipped':
      return outcome.reason === 'declined'
        ? { level: 'info', message: `Kept existing ${relative}` }
        : {
            level: 'warn',
            message: `${capitalize(label)} '${outcome.item}' already exists at ${relative}, skipping`,
          };
    case 'failed':
      return { level: 'fail', message: `Failed to install ${label} '${outcome.item}': ${outcome.reason}` };
  }
}

export function printOutcome(outcome: InstallOutcome, label: string, targetRoot: string): void {
  const line = describeOutcome(outcome, label, targetRoot);
  log[line.level](line.message);
}

/**
 * Print a report: one line per outcome, then its notes.
 */
export function printReport(report: InstallReport, targetRoot: string): void {
  const label = ITEM_LABELS[report.component];

  if (report.error) {
    log.fail(`${capitalize(report.component)}: ${report.error.message}`);
    return;
  }

  if (report.outcomes.length === 0) {
    log.info(`No ${report.component} to install`);
  }

  for (const outcome of report.outcomes) {
    printOutcome(outcome, label, targetRoot);
  }

  printNotes(report.notes);
}

export function printNotes(notes: readonly string[]): void {
  for (const note of notes) {
    console.log();
    for (const line of note.split('\n')) {
      console.log(`    ${chalk.dim(line)}`);
    }
  }
}

/**
 * One-line totals across several reports, e.g. "5 installed, 2 skipped, 0 failed".
 */
export function formatSummary(reports: readonly InstallReport[]): string {
  const totals = summarizeOutcomes(reports.flatMap(report => report.outcomes));
  const aborted = reports.filter(report => report.error).length;
  const parts = [`${totals.installed} installed`, `${totals.skipped} skipped`, `${totals.failed} failed`];
  if (aborted > 0) {
    parts.push(`${aborted} step${aborted === 1 ? '' : 's'} could not run`);
  }
  return parts.join(', ');
}

/**
 * Status lines for the menu and the status command.
 */
export function formatStatusLines(status: InstallationStatus, settingsLabel: string): string[] {
  const entries: Array<[boolean, string]> = [
    [status.claudeMd, 'CLAUDE.md'],
    [status.settings, settingsLabel],
    [status.skills, 'Skills'],
    [status.agents, 'Agents'],
    [status.hooks, 'Hooks'],
    [status.rules, 'Rules'],
    [status.precommit, 'Pre-commit review'],
  ];
  return entries.map(([present, name]) => `    ${present ? chalk.green('✓') : chalk.dim('○')} ${name}`);
}

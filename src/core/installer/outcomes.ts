import type { ComponentName } from '../catalog/types.js';
import type { InstallerError } from '../../utils/errors.js';
import type { InstallOutcome, InstallReport, ReportSummary, SkipReason } from './types.js';

export function installed(item: string, destination: string): InstallOutcome {
  const outcome: InstallOutcome = { status: 'installed', item, destination };
  return Object.freeze(outcome);
}

export function skipped(
  item: string,
  destination: string,
  reason: SkipReason = 'already-exists'
): InstallOutcome {
  const outcome: InstallOutcome = { status: 'skipped', item, destination, reason };
  return Object.freeze(outcome);
}

export function failed(item: string, destination: string, reason: string): InstallOutcome {
  const outcome: InstallOutcome = { status: 'failed', item, destination, reason };
  return Object.freeze(outcome);
}

export function createReport(
  component: ComponentName,
  outcomes: readonly InstallOutcome[],
  notes: readonly string[] = [],
  error?: InstallerError
): InstallReport {
  const report: InstallReport = {
    component,
    outcomes: Object.freeze([...outcomes]),
    notes: Object.freeze([...notes]),
    ...(error ? { error } : {}),
  };
  return Object.freeze(report);
}

export function summarizeOutcomes(outcomes: readonly InstallOutcome[]): ReportSummary {
  const summary: ReportSummary = { installed: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return summary;
}

/**
 * Type definitions for the component installer.
 */
import type { InstallerError } from '../../utils/errors.js';
import type { ComponentName } from '../catalog/types.js';

/** Why an item was left alone. */
export type SkipReason = 'already-exists' | 'declined';

/**
 * Result of installing one item. Created once and never mutated.
 */
export type InstallOutcome =
  | {
      readonly status: 'installed';
      readonly item: string;
      readonly destination: string;
    }
  | {
      readonly status: 'skipped';
      readonly item: string;
      readonly destination: string;
      readonly reason: SkipReason;
    }
  | {
      readonly status: 'failed';
      readonly item: string;
      readonly destination: string;
      readonly reason: string;
    };

export type InstallStatus = InstallOutcome['status'];

/**
 * Everything one operation did, in order.
 */
export interface InstallReport {
  readonly component: ComponentName;
  readonly outcomes: readonly InstallOutcome[];
  /** Advice for the user: manual merges, template locations, backups */
  readonly notes: readonly string[];
  /** Set when the operation could not proceed at all (only inside `all`) */
  readonly error?: InstallerError;
}

/**
 * Which parts of the configuration already exist in a target project.
 */
export interface InstallationStatus {
  claudeMd: boolean;
  settings: boolean;
  skills: boolean;
  agents: boolean;
  hooks: boolean;
  rules: boolean;
  precommit: boolean;
}

/**
 * Counts of outcomes by status.
 */
export interface ReportSummary {
  installed: number;
  skipped: number;
  failed: number;
}

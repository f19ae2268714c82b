import * as path from 'node:path';
import type { DistributionLayout } from '../catalog/catalog.js';
import { fileExists, isNonEmptyDirectory } from '../../utils/file-system.js';
import { findGitDir, gitHooksDir } from '../../utils/git.js';
import type { InstallationStatus } from './types.js';

export const PROJECT_INSTRUCTIONS_FILE = 'CLAUDE.md';

/**
 * Inspect the target project for components that are already in place.
 * A directory component counts as installed when its directory has any entry.
 */
export async function getInstallationStatus(layout: DistributionLayout): Promise<InstallationStatus> {
  const configDir = layout.targetConfigDir;
  const gitDir = await findGitDir(layout.targetRoot);

  return {
    claudeMd: await fileExists(path.join(layout.targetRoot, PROJECT_INSTRUCTIONS_FILE)),
    settings: await fileExists(layout.targetSettingsFile),
    skills: await isNonEmptyDirectory(path.join(configDir, 'skills')),
    agents: await isNonEmptyDirectory(path.join(configDir, 'agents')),
    hooks: await isNonEmptyDirectory(path.join(configDir, 'hooks')),
    rules: await isNonEmptyDirectory(path.join(configDir, 'rules')),
    precommit: gitDir ? await fileExists(path.join(gitHooksDir(gitDir), 'pre-commit')) : false,
  };
}

import * as path from 'node:path';
import { InstallerConfigSchema, type InstallerConfig } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';

export const CONFIG_FILE_NAME = 'adopt.yaml';

/**
 * Default configuration values.
 * Used when the distribution has no adopt.yaml.
 */
export function getDefaultConfig(): InstallerConfig {
  return InstallerConfigSchema.parse({});
}

/**
 * Load the distribution configuration.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  sourceRoot: string,
  configPath?: string
): Promise<InstallerConfig> {
  const fullPath = configPath
    ? path.resolve(sourceRoot, configPath)
    : getConfigPath(sourceRoot);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  return loadYamlWithSchema(fullPath, InstallerConfigSchema);
}

/**
 * Get the expected config file path for a distribution.
 */
export function getConfigPath(sourceRoot: string): string {
  return path.resolve(sourceRoot, CONFIG_FILE_NAME);
}

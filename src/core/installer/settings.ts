/**
 * Read-only inspection of settings files. The installer never rewrites an
 * existing settings file; what it learns here only feeds advice to the user.
 */
import { SettingsFileSchema, type SettingsFile } from '../config/schema.js';
import { fileExists, readFile } from '../../utils/file-system.js';

export type SettingsReadResult =
  | { state: 'missing' }
  | { state: 'malformed'; reason: string }
  | { state: 'ok'; settings: SettingsFile };

export async function readSettingsFile(filePath: string): Promise<SettingsReadResult> {
  if (!(await fileExists(filePath))) {
    return { state: 'missing' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath));
  } catch (error) {
    return { state: 'malformed', reason: error instanceof Error ? error.message : String(error) };
  }

  const result = SettingsFileSchema.safeParse(raw);
  if (!result.success) {
    return { state: 'malformed', reason: result.error.issues.map(i => i.message).join('; ') };
  }
  return { state: 'ok', settings: result.data };
}

/**
 * Whether a settings file declares a hooks section.
 */
export function hasHooksSection(settings: SettingsFile): boolean {
  return settings.hooks !== undefined && settings.hooks !== null;
}

/**
 * The `"deny": [...]` fragment a user should merge into their settings file.
 */
export function formatDenySnippet(deny: readonly string[]): string {
  const entries = deny.map(rule => `  ${JSON.stringify(rule)}`).join(',\n');
  return `"deny": [\n${entries}\n]`;
}

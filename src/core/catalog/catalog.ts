/**
 * Live catalog of installable items.
 *
 * Nothing here is cached: every call lists the distribution tree again, so the
 * catalog always reflects the files currently on disk.
 */
import * as path from 'node:path';
import type { InstallerConfig } from '../config/schema.js';
import { globFiles, isDirectory, isFile } from '../../utils/file-system.js';
import { CatalogError, ErrorCodes } from '../../utils/errors.js';
import { COMPONENTS } from './components.js';
import type {
  CatalogKind,
  ComponentName,
  InstallableItem,
  ResolvedComponent,
  StackId,
} from './types.js';

const AGENT_EXTENSION = '.md';

/**
 * Absolute locations the installer reads from and writes to.
 */
export interface DistributionLayout {
  sourceRoot: string;
  targetRoot: string;
  /** Configuration directory inside the distribution (e.g. <source>/.claude) */
  sourceConfigDir: string;
  /** Configuration directory inside the target project (e.g. <target>/.claude) */
  targetConfigDir: string;
  /** Stack presets directory inside the distribution */
  stacksDir: string;
  /** Settings file shipped with the distribution */
  sourceSettingsFile: string;
  /** Settings file of the target project */
  targetSettingsFile: string;
}

export function resolveLayout(
  sourceRoot: string,
  targetRoot: string,
  config: InstallerConfig
): DistributionLayout {
  const source = path.resolve(sourceRoot);
  const target = path.resolve(targetRoot);
  const sourceConfigDir = path.join(source, config.source_dir);
  const targetConfigDir = path.join(target, config.target_dir);

  return {
    sourceRoot: source,
    targetRoot: target,
    sourceConfigDir,
    targetConfigDir,
    stacksDir: path.join(source, config.stacks_dir),
    sourceSettingsFile: path.join(sourceConfigDir, config.settings_file),
    targetSettingsFile: path.join(targetConfigDir, config.settings_file),
  };
}

/**
 * Resolve a component's source and target locations.
 */
export function resolveComponent(name: ComponentName, layout: DistributionLayout): ResolvedComponent {
  const definition = COMPONENTS[name];
  const directory = definition.directory ?? '';
  return {
    definition,
    sourcePath: path.join(layout.sourceConfigDir, directory),
    targetPath: path.join(layout.targetConfigDir, directory),
  };
}

/**
 * Enumerate the items of a directory-items or file-items component.
 *
 * @param exclude - Item names that belong to another component
 * @throws CatalogError when the component's source directory is missing
 */
export async function listItems(
  component: ResolvedComponent,
  exclude: readonly string[] = []
): Promise<InstallableItem[]> {
  const { definition, sourcePath, targetPath } = component;

  if (!definition.pattern || !(await isDirectory(sourcePath))) {
    throw new CatalogError(
      ErrorCodes.COMPONENT_NOT_FOUND,
      `No ${definition.name} found in distribution (${sourcePath})`,
      { component: definition.name, sourcePath }
    );
  }

  const isDirectoryItem = definition.kind === 'directory-items';
  const names = await globFiles(definition.pattern, {
    cwd: sourcePath,
    absolute: false,
    onlyDirectories: isDirectoryItem,
  });

  return names
    .filter(name => !exclude.includes(name))
    .map(name => ({
      itemName: name,
      sourceFile: path.join(sourcePath, name),
      destFile: path.join(targetPath, name),
      isDirectory: isDirectoryItem,
      executable: definition.executable === true,
    }));
}

function catalogComponent(kind: CatalogKind, layout: DistributionLayout): ResolvedComponent {
  return resolveComponent(kind === 'skill' ? 'skills' : 'agents', layout);
}

/**
 * Names available for single-item installs, as the user would type them.
 */
export async function listCatalog(kind: CatalogKind, layout: DistributionLayout): Promise<string[]> {
  const component = catalogComponent(kind, layout);
  if (!(await isDirectory(component.sourcePath))) {
    return [];
  }
  const items = await listItems(component);
  return items.map(item => displayName(kind, item.itemName));
}

/**
 * Look up one catalog entry by its user-facing name.
 * The name must already have passed item-name validation.
 */
export async function findCatalogItem(
  kind: CatalogKind,
  name: string,
  layout: DistributionLayout
): Promise<InstallableItem | null> {
  const component = catalogComponent(kind, layout);
  const fileName = kind === 'agent' ? `${name}${AGENT_EXTENSION}` : name;
  const sourceFile = path.join(component.sourcePath, fileName);

  const exists = kind === 'skill' ? await isDirectory(sourceFile) : await isFile(sourceFile);
  if (!exists) {
    return null;
  }

  return {
    itemName: fileName,
    sourceFile,
    destFile: path.join(component.targetPath, fileName),
    isDirectory: kind === 'skill',
    executable: false,
  };
}

function displayName(kind: CatalogKind, itemName: string): string {
  return kind === 'agent' && itemName.endsWith(AGENT_EXTENSION)
    ? itemName.slice(0, -AGENT_EXTENSION.length)
    : itemName;
}

/**
 * Files of one stack preset. Each entry is null when the preset doesn't ship it.
 */
export interface StackFiles {
  rules: string | null;
  settings: string | null;
  template: string | null;
}

export async function findStackFiles(
  stackId: StackId,
  layout: DistributionLayout,
  settingsFileName: string
): Promise<StackFiles> {
  const stackDir = path.join(layout.stacksDir, stackId);
  const candidate = async (name: string): Promise<string | null> => {
    const filePath = path.join(stackDir, name);
    return (await isFile(filePath)) ? filePath : null;
  };

  return {
    rules: await candidate('rules.md'),
    settings: await candidate(settingsFileName),
    template: await candidate('CLAUDE.md'),
  };
}

/**
 * Component and stack enumerations.
 */

/** Installable components, in the order the menu and `all` present them. */
export const COMPONENT_NAMES = [
  'skills',
  'agents',
  'hooks',
  'rules',
  'precommit',
  'security',
  'stack',
] as const;

export type ComponentName = (typeof COMPONENT_NAMES)[number];

/**
 * How a component maps onto the distribution tree.
 * - directory-items: every subdirectory is one item (skills)
 * - file-items: every matching file is one item (agents, hooks, rules)
 * - composite: a fixed multi-step procedure (precommit, security, stack)
 */
export type ComponentKind = 'directory-items' | 'file-items' | 'composite';

export interface ComponentDefinition {
  name: ComponentName;
  /** Menu label */
  label: string;
  /** One-line summary for help and menu */
  description: string;
  kind: ComponentKind;
  /** Subdirectory of the configuration directory holding the items */
  directory?: string;
  /** Glob matched inside `directory` */
  pattern?: string;
  /** Installed items get the executable bit */
  executable?: boolean;
}

/**
 * A component resolved against concrete source and target roots.
 */
export interface ResolvedComponent {
  definition: ComponentDefinition;
  /** Absolute location in the distribution */
  sourcePath: string;
  /** Absolute location under the target project's configuration directory */
  targetPath: string;
}

/**
 * One file or directory belonging to a component.
 */
export interface InstallableItem {
  itemName: string;
  sourceFile: string;
  destFile: string;
  /** Whole directory copied recursively */
  isDirectory: boolean;
  executable: boolean;
}

/** Collections that support single-item installs. */
export const CATALOG_KINDS = ['skill', 'agent'] as const;

export type CatalogKind = (typeof CATALOG_KINDS)[number];

/** Language/platform presets under the stacks directory. */
export const STACK_IDS = ['typescript', 'python', 'go', 'rust', 'ruby', 'elixir'] as const;

export type StackId = (typeof STACK_IDS)[number];

export const STACK_LABELS: Readonly<Record<StackId, string>> = {
  typescript: 'TypeScript',
  python: 'Python',
  go: 'Go',
  rust: 'Rust',
  ruby: 'Ruby',
  elixir: 'Elixir',
};

export function isComponentName(value: string): value is ComponentName {
  return COMPONENT_NAMES.some(name => name === value);
}

export function isStackId(value: string): value is StackId {
  return STACK_IDS.some(id => id === value);
}

export function isCatalogKind(value: string): value is CatalogKind {
  return CATALOG_KINDS.some(kind => kind === value);
}

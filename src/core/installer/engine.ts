/**
 * Component installer.
 *
 * Copies components from a read-only distribution tree into a target project
 * without overwriting anything already there. Each operation takes its roots
 * from the constructor, never from the process, and returns a report instead
 * of printing.
 */
import * as path from 'node:path';
import { getDefaultConfig } from '../config/loader.js';
import type { InstallerConfig } from '../config/schema.js';
import {
  ALL_SEQUENCE,
  STACK_IDS,
  STACK_LABELS,
  findCatalogItem,
  findStackFiles,
  isCatalogKind,
  isComponentName,
  isStackId,
  listCatalog,
  listItems,
  resolveComponent,
  resolveLayout,
  COMPONENT_NAMES,
  CATALOG_KINDS,
  type CatalogKind,
  type ComponentName,
  type DistributionLayout,
  type InstallableItem,
  type StackId,
} from '../catalog/index.js';
import {
  CatalogError,
  ErrorCodes,
  InstallerError,
  SystemError,
  ValidationError,
  getErrnoCode,
  getErrorMessage,
} from '../../utils/errors.js';
import {
  copyDirectory,
  copyFileExclusive,
  copyFileReplacing,
  ensureDir,
  entryExists,
  fileExists,
  filesEqual,
  isFile,
  makeExecutable,
  movePath,
} from '../../utils/file-system.js';
import { findGitDir, gitHooksDir } from '../../utils/git.js';
import { logger, type Logger } from '../../utils/logger.js';
import type { Prompter } from '../../utils/prompt.js';
import { createReport, failed, installed, skipped } from './outcomes.js';
import { formatDenySnippet, hasHooksSection, readSettingsFile } from './settings.js';
import { getInstallationStatus } from './status.js';
import type { InstallOutcome, InstallReport, InstallationStatus } from './types.js';
import { validateItemName } from './validation.js';

const GIT_PRECOMMIT_HOOK = 'pre-commit';
const BACKUP_SUFFIX = '.backup';

export interface ComponentInstallerOptions {
  /** Root of the distribution to copy from */
  sourceRoot: string;
  /** Root of the project to install into */
  targetRoot: string;
  /** Distribution configuration (defaults when omitted) */
  config?: InstallerConfig;
  /** Answers stack selection and overwrite confirmation */
  prompter: Prompter;
  log?: Logger;
}

/**
 * Parse a stack selection: a menu number (1-6) or a stack id.
 */
export function parseStackChoice(input: string): StackId | null {
  const normalized = input.trim().toLowerCase();
  const index = Number.parseInt(normalized, 10);
  if (String(index) === normalized && index >= 1 && index <= STACK_IDS.length) {
    return STACK_IDS[index - 1] ?? null;
  }
  return isStackId(normalized) ? normalized : null;
}

function toInstallerError(error: unknown): InstallerError {
  if (error instanceof InstallerError) {
    return error;
  }
  return new SystemError(ErrorCodes.FILESYSTEM_ERROR, getErrorMessage(error), {
    errno: getErrnoCode(error),
  });
}

function isAlreadyExistsError(error: unknown): boolean {
  const code = getErrnoCode(error);
  return code === 'EEXIST' || code === 'ERR_FS_CP_EEXIST';
}

export class ComponentInstaller {
  private readonly layout: DistributionLayout;
  private readonly config: InstallerConfig;
  private readonly prompter: Prompter;
  private readonly log: Logger;

  constructor(options: ComponentInstallerOptions) {
    this.config = options.config ?? getDefaultConfig();
    this.layout = resolveLayout(options.sourceRoot, options.targetRoot, this.config);
    this.prompter = options.prompter;
    this.log = options.log ?? logger.child('installer');
  }

  /**
   * Install every item of a component.
   *
   * @throws ValidationError for names outside the component enumeration
   * @throws CatalogError when the distribution lacks the component
   * @throws SystemError for precommit outside a git repository
   */
  async installComponent(name: string): Promise<InstallReport> {
    if (!isComponentName(name)) {
      throw new ValidationError(
        ErrorCodes.INVALID_COMPONENT_NAME,
        `Unknown component: ${name}`,
        { name, valid: [...COMPONENT_NAMES] }
      );
    }

    switch (name) {
      case 'skills':
      case 'agents':
      case 'rules':
        return this.installItems(name);
      case 'hooks':
        return this.installHooks();
      case 'precommit':
        return this.installPrecommit();
      case 'security':
        return this.installSecurityBundle();
      case 'stack':
        return this.installStackPreset(await this.selectStack());
    }
  }

  /**
   * Install one named skill or agent.
   *
   * @throws SecurityError when the name could escape the catalog directory
   * @throws CatalogError when the name is not in the live catalog; `details.available` lists it
   */
  async installSingleItem(kind: string, itemName: string): Promise<InstallOutcome> {
    if (!isCatalogKind(kind)) {
      throw new ValidationError(
        ErrorCodes.INVALID_COMPONENT_NAME,
        `Unknown collection: ${kind}`,
        { kind, valid: [...CATALOG_KINDS] }
      );
    }
    validateItemName(kind, itemName);

    const item = await findCatalogItem(kind, itemName, this.layout);
    if (!item) {
      const available = await listCatalog(kind, this.layout);
      throw new CatalogError(
        ErrorCodes.COMPONENT_NOT_FOUND,
        `${kind === 'skill' ? 'Skill' : 'Agent'} '${itemName}' not found`,
        { kind, itemName, available }
      );
    }

    await ensureDir(path.dirname(item.destFile));
    return this.installItem(item);
  }

  /**
   * Install the command validation hook, the settings file and the security rules.
   * An existing settings file is never touched; the report carries the deny rules
   * to merge by hand instead.
   */
  async installSecurityBundle(): Promise<InstallReport> {
    const { sourceConfigDir, targetConfigDir, sourceSettingsFile, targetSettingsFile } = this.layout;
    const { security, settings_file: settingsFileName } = this.config;
    const outcomes: InstallOutcome[] = [];
    const notes: string[] = [];

    const hooksDir = path.join(targetConfigDir, 'hooks');
    await ensureDir(hooksDir);
    outcomes.push(
      await this.installIfPresent({
        itemName: security.hook,
        sourceFile: path.join(sourceConfigDir, 'hooks', security.hook),
        destFile: path.join(hooksDir, security.hook),
        isDirectory: false,
        executable: true,
      })
    );

    if (await fileExists(targetSettingsFile)) {
      outcomes.push(skipped(settingsFileName, targetSettingsFile));
      const deny = await this.bundledDenyRules();
      notes.push(
        `${settingsFileName} exists - please merge security settings manually.\n` +
          `Add these deny rules to your ${settingsFileName}:\n${formatDenySnippet(deny)}`
      );
    } else {
      outcomes.push(
        await this.installIfPresent({
          itemName: settingsFileName,
          sourceFile: sourceSettingsFile,
          destFile: targetSettingsFile,
          isDirectory: false,
          executable: false,
        })
      );
    }

    const rulesDir = path.join(targetConfigDir, 'rules');
    await ensureDir(rulesDir);
    for (const rule of security.rules) {
      const sourceFile = path.join(sourceConfigDir, 'rules', rule);
      if (!(await isFile(sourceFile))) {
        this.log.debug(`Security rule not in distribution: ${rule}`);
        continue;
      }
      outcomes.push(
        await this.installItem({
          itemName: rule,
          sourceFile,
          destFile: path.join(rulesDir, rule),
          isDirectory: false,
          executable: false,
        })
      );
    }

    return createReport('security', outcomes, notes);
  }

  /**
   * Install a language preset. The stack's rules land under a stack-qualified
   * name; replacing an existing settings file needs explicit confirmation.
   *
   * @throws ValidationError for unknown stack ids
   * @throws CatalogError when the distribution has no files for the stack
   */
  async installStackPreset(stackId: string): Promise<InstallReport> {
    if (!isStackId(stackId)) {
      throw new ValidationError(
        ErrorCodes.INVALID_COMPONENT_NAME,
        `Unknown stack: ${stackId}`,
        { stackId, valid: [...STACK_IDS] }
      );
    }

    const { targetConfigDir, targetSettingsFile, sourceRoot } = this.layout;
    const settingsFileName = this.config.settings_file;
    const files = await findStackFiles(stackId, this.layout, settingsFileName);

    if (!files.rules && !files.settings) {
      throw new CatalogError(
        ErrorCodes.COMPONENT_NOT_FOUND,
        `Stack preset '${stackId}' not found in distribution`,
        { stackId, stacksDir: this.layout.stacksDir }
      );
    }

    const outcomes: InstallOutcome[] = [];
    const notes: string[] = [];

    if (files.rules) {
      const rulesDir = path.join(targetConfigDir, 'rules');
      await ensureDir(rulesDir);
      outcomes.push(
        await this.installItem({
          itemName: `${stackId}.md`,
          sourceFile: files.rules,
          destFile: path.join(rulesDir, `${stackId}.md`),
          isDirectory: false,
          executable: false,
        })
      );
    }

    if (files.settings) {
      await ensureDir(targetConfigDir);
      if (await fileExists(targetSettingsFile)) {
        outcomes.push(await this.replaceSettings(stackId, files.settings));
      } else {
        outcomes.push(
          await this.installItem({
            itemName: settingsFileName,
            sourceFile: files.settings,
            destFile: targetSettingsFile,
            isDirectory: false,
            executable: false,
          })
        );
      }
    }

    if (files.template) {
      notes.push(
        `Stack template available at: ${path.relative(sourceRoot, files.template)}\n` +
          'Copy and customize for your project.'
      );
    }

    return createReport('stack', outcomes, notes);
  }

  /**
   * Install the review script and register it as the git pre-commit hook.
   * A different pre-existing hook is moved aside, never deleted.
   *
   * @throws SystemError when the target is not a git repository
   */
  async installPrecommit(): Promise<InstallReport> {
    const gitDir = await findGitDir(this.layout.targetRoot);
    if (!gitDir) {
      throw new SystemError(
        ErrorCodes.NOT_A_GIT_REPOSITORY,
        "Not a git repository. Run 'git init' first.",
        { targetRoot: this.layout.targetRoot }
      );
    }

    const script = this.config.precommit.script;
    const sourceFile = path.join(this.layout.sourceConfigDir, 'hooks', script);
    if (!(await isFile(sourceFile))) {
      throw new CatalogError(
        ErrorCodes.COMPONENT_NOT_FOUND,
        `Pre-commit script '${script}' not found in distribution`,
        { sourceFile }
      );
    }

    const outcomes: InstallOutcome[] = [];
    const notes: string[] = [];

    const hooksDir = path.join(this.layout.targetConfigDir, 'hooks');
    await ensureDir(hooksDir);
    outcomes.push(
      await this.installItem({
        itemName: script,
        sourceFile,
        destFile: path.join(hooksDir, script),
        isDirectory: false,
        executable: true,
      })
    );

    const gitHooks = gitHooksDir(gitDir);
    await ensureDir(gitHooks);
    const hookPath = path.join(gitHooks, GIT_PRECOMMIT_HOOK);

    if (await entryExists(hookPath)) {
      if ((await isFile(hookPath)) && (await filesEqual(hookPath, sourceFile))) {
        outcomes.push(skipped(GIT_PRECOMMIT_HOOK, hookPath));
        return createReport('precommit', outcomes, notes);
      }
      const backupPath = await this.nextBackupPath(hookPath);
      await movePath(hookPath, backupPath);
      notes.push(`Existing hook saved to ${path.relative(this.layout.targetRoot, backupPath)}`);
    }

    const hookOutcome = await this.installItem({
      itemName: GIT_PRECOMMIT_HOOK,
      sourceFile,
      destFile: hookPath,
      isDirectory: false,
      executable: true,
    });
    outcomes.push(hookOutcome);

    if (hookOutcome.status === 'installed') {
      notes.push(
        'Every commit will now show a review summary.\n' +
          'Skip with: SKIP_PRE_COMMIT_REVIEW=1 git commit'
      );
    }

    return createReport('precommit', outcomes, notes);
  }

  /**
   * Run skills, agents, hooks, rules and security in order. A step that cannot
   * proceed is recorded in its report and the next step still runs.
   */
  async installAll(): Promise<InstallReport[]> {
    const reports: InstallReport[] = [];
    for (const name of ALL_SEQUENCE) {
      try {
        reports.push(await this.installComponent(name));
      } catch (error) {
        this.log.debug(`Step ${name} failed`, { error: getErrorMessage(error) });
        reports.push(createReport(name, [], [], toInstallerError(error)));
      }
    }
    return reports;
  }

  /**
   * Names available for single-item installs.
   */
  async listCatalog(kind: CatalogKind): Promise<string[]> {
    return listCatalog(kind, this.layout);
  }

  async getInstallationStatus(): Promise<InstallationStatus> {
    return getInstallationStatus(this.layout);
  }

  private async installItems(
    name: ComponentName,
    exclude: readonly string[] = []
  ): Promise<InstallReport> {
    const component = resolveComponent(name, this.layout);
    const items = await listItems(component, exclude);

    await ensureDir(component.targetPath);

    const outcomes: InstallOutcome[] = [];
    for (const item of items) {
      outcomes.push(await this.installItem(item));
    }
    return createReport(name, outcomes);
  }

  private async installHooks(): Promise<InstallReport> {
    const report = await this.installItems('hooks', this.config.hooks.exclude);
    const notes: string[] = [];
    const settingsName = this.config.settings_file;

    const result = await readSettingsFile(this.layout.targetSettingsFile);
    if (result.state === 'ok' && !hasHooksSection(result.settings)) {
      notes.push(
        `Add hooks configuration to ${this.config.target_dir}/${settingsName} manually.\n` +
          'See README.md for hook configuration examples.'
      );
    } else if (result.state === 'malformed') {
      notes.push(
        `Could not read ${this.config.target_dir}/${settingsName} (${result.reason}); ` +
          'add hooks configuration manually.'
      );
    }

    return createReport('hooks', report.outcomes, notes);
  }

  /**
   * Copy one item unless its destination exists. The destination's parent
   * directory must already exist.
   */
  private async installItem(item: InstallableItem): Promise<InstallOutcome> {
    try {
      if (await fileExists(item.destFile)) {
        return skipped(item.itemName, item.destFile);
      }
      this.log.debug(`Copying ${item.sourceFile} -> ${item.destFile}`);
      if (item.isDirectory) {
        await copyDirectory(item.sourceFile, item.destFile);
      } else {
        await copyFileExclusive(item.sourceFile, item.destFile);
      }
      if (item.executable) {
        await makeExecutable(item.destFile);
      }
      return installed(item.itemName, item.destFile);
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        return skipped(item.itemName, item.destFile);
      }
      return failed(item.itemName, item.destFile, getErrorMessage(error));
    }
  }

  private async installIfPresent(item: InstallableItem): Promise<InstallOutcome> {
    if (!(await isFile(item.sourceFile))) {
      return failed(item.itemName, item.destFile, `Not found in distribution: ${item.sourceFile}`);
    }
    return this.installItem(item);
  }

  private async replaceSettings(stackId: StackId, sourceFile: string): Promise<InstallOutcome> {
    const { targetSettingsFile } = this.layout;
    const settingsFileName = this.config.settings_file;

    const confirmed = await this.prompter.confirm(
      `  Replace ${settingsFileName} with ${STACK_LABELS[stackId]} preset?`,
      false
    );
    if (!confirmed) {
      return skipped(settingsFileName, targetSettingsFile, 'declined');
    }

    try {
      await copyFileReplacing(sourceFile, targetSettingsFile);
      return installed(settingsFileName, targetSettingsFile);
    } catch (error) {
      return failed(settingsFileName, targetSettingsFile, getErrorMessage(error));
    }
  }

  private async selectStack(): Promise<string> {
    const lines = STACK_IDS.map((id, i) => `    ${i + 1}) ${STACK_LABELS[id]}`);
    const answer = await this.prompter.ask(
      `\n  Available stacks:\n${lines.join('\n')}\n\n  Select stack [1-${STACK_IDS.length}]: `
    );
    const stackId = parseStackChoice(answer);
    if (!stackId) {
      throw new ValidationError(ErrorCodes.INVALID_MENU_CHOICE, `Invalid stack choice: '${answer}'`, {
        answer,
      });
    }
    return stackId;
  }

  private async bundledDenyRules(): Promise<readonly string[]> {
    const result = await readSettingsFile(this.layout.sourceSettingsFile);
    const deny = result.state === 'ok' ? result.settings.permissions?.deny : undefined;
    return deny && deny.length > 0 ? deny : this.config.security.deny;
  }

  private async nextBackupPath(hookPath: string): Promise<string> {
    let candidate = `${hookPath}${BACKUP_SUFFIX}`;
    for (let n = 1; await entryExists(candidate); n++) {
      candidate = `${hookPath}${BACKUP_SUFFIX}.${n}`;
    }
    return candidate;
  }
}

/**
 * Per-invocation wiring: resolves roots from global options, loads the
 * distribution config and builds the installer.
 */
import * as path from 'node:path';
import type { Command } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import type { InstallerConfig } from '../core/config/schema.js';
import { ComponentInstaller } from '../core/installer/engine.js';
import { ErrorCodes, SystemError } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';
import { ReadlinePrompter, type Prompter } from '../utils/prompt.js';

export type GlobalOptions = {
  target?: string;
  source?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Injectable collaborators of the CLI.
 */
export interface CliDependencies {
  /** Distribution used when --source is not given */
  defaultSourceRoot: string;
  /** Base for relative --target/--source values and the default target */
  cwd: () => string;
  createPrompter: () => Prompter;
}

export interface CliContext {
  installer: ComponentInstaller;
  prompter: Prompter;
  config: InstallerConfig;
  sourceRoot: string;
  targetRoot: string;
}

export function defaultDependencies(defaultSourceRoot: string): CliDependencies {
  return {
    defaultSourceRoot,
    cwd: () => process.cwd(),
    createPrompter: () => new ReadlinePrompter(),
  };
}

export function applyLogLevel(options: GlobalOptions): void {
  if (options.quiet) {
    log.setLevel('error');
  } else if (options.verbose) {
    log.setLevel('debug');
  } else {
    log.setLevel('info');
  }
}

/**
 * Build the context for one command.
 *
 * @throws SystemError when the target is the distribution itself
 * @throws ConfigError when adopt.yaml is invalid
 */
export async function createContext(options: GlobalOptions, deps: CliDependencies): Promise<CliContext> {
  applyLogLevel(options);

  const cwd = deps.cwd();
  const sourceRoot = path.resolve(cwd, options.source ?? deps.defaultSourceRoot);
  const targetRoot = path.resolve(cwd, options.target ?? '.');

  if (sourceRoot === targetRoot) {
    throw new SystemError(
      ErrorCodes.SAME_SOURCE_AND_TARGET,
      'Cannot adopt into the starter distribution itself. Run from your project directory or pass --target.',
      { sourceRoot, targetRoot }
    );
  }

  const config = await loadConfig(sourceRoot);
  log.debug('Resolved roots', { sourceRoot, targetRoot });

  const prompter = deps.createPrompter();
  const installer = new ComponentInstaller({ sourceRoot, targetRoot, config, prompter });
  return { installer, prompter, config, sourceRoot, targetRoot };
}

/**
 * Run an action with a fresh context, releasing the prompter afterwards.
 */
export async function withContext(
  command: Command,
  deps: CliDependencies,
  run: (ctx: CliContext) => Promise<void>
): Promise<void> {
  const ctx = await createContext(command.optsWithGlobals<GlobalOptions>(), deps);
  try {
    await run(ctx);
  } finally {
    ctx.prompter.close();
  }
}

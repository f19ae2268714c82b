/**
 * Non-interactive install commands: one per component, plus `all`,
 * `skill <name>`, `agent <name>` and `status`.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { COMPONENTS } from '../../core/catalog/components.js';
import { COMPONENT_NAMES, type CatalogKind, type ComponentName } from '../../core/catalog/types.js';
import type { InstallReport } from '../../core/installer/types.js';
import { CatalogError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { withContext, type CliContext, type CliDependencies } from '../context.js';
import { formatStatusLines, formatSummary, printOutcome, printReport } from '../formatters/report.js';

function fail(error: unknown): never {
  log.error(error instanceof Error ? error.message : 'Unknown error');
  process.exit(1);
}

function printHeading(text: string): void {
  console.log();
  console.log(chalk.bold(text));
}

function printDone(): void {
  console.log();
  log.success('Done!');
}

/**
 * Install one component and print its report.
 */
export async function runComponent(ctx: CliContext, name: ComponentName): Promise<InstallReport> {
  printHeading(`Installing ${COMPONENTS[name].label.toLowerCase()}...`);
  const report = await ctx.installer.installComponent(name);
  printReport(report, ctx.targetRoot);
  return report;
}

/**
 * Install the `all` sequence, printing every step and a closing summary.
 */
export async function runAll(ctx: CliContext): Promise<InstallReport[]> {
  printHeading('Installing everything...');
  const reports = await ctx.installer.installAll();
  for (const report of reports) {
    printHeading(COMPONENTS[report.component].label);
    printReport(report, ctx.targetRoot);
  }
  console.log();
  log.info(formatSummary(reports));
  return reports;
}

export async function runSingleItem(ctx: CliContext, kind: CatalogKind, itemName: string): Promise<void> {
  try {
    const outcome = await ctx.installer.installSingleItem(kind, itemName);
    printOutcome(outcome, kind, ctx.targetRoot);
  } catch (error) {
    if (error instanceof CatalogError) {
      printAvailable(kind, error.details?.available);
    }
    throw error;
  }
}

function printAvailable(kind: CatalogKind, available: unknown): void {
  if (!Array.isArray(available)) {
    return;
  }
  const names = available.filter((name): name is string => typeof name === 'string');
  console.log();
  console.log(`  Available ${kind}s:`);
  if (names.length === 0) {
    console.log(chalk.dim('    (none)'));
  }
  for (const name of names) {
    console.log(`    - ${name}`);
  }
  console.log();
}

export function settingsLabel(ctx: CliContext): string {
  return `${ctx.config.target_dir}/${ctx.config.settings_file}`;
}

export async function runStatus(ctx: CliContext): Promise<void> {
  const status = await ctx.installer.getInstallationStatus();
  printHeading('Current status:');
  for (const line of formatStatusLines(status, settingsLabel(ctx))) {
    console.log(line);
  }
  console.log();
}

/**
 * Create the command for a single component (skills, agents, hooks, rules,
 * precommit, security).
 */
export function createComponentCommand(name: ComponentName, deps: CliDependencies): Command {
  return new Command(name)
    .description(COMPONENTS[name].description)
    .action(async (_options: object, command: Command) => {
      try {
        await withContext(command, deps, async (ctx) => {
          await runComponent(ctx, name);
          printDone();
        });
      } catch (error) {
        fail(error);
      }
    });
}

/**
 * `stack [id]`: without an id the stack menu is shown.
 */
export function createStackCommand(deps: CliDependencies): Command {
  return new Command('stack')
    .description(COMPONENTS.stack.description)
    .argument('[id]', 'Stack id or menu number (1-6)')
    .action(async (id: string | undefined, _options: object, command: Command) => {
      try {
        await withContext(command, deps, async (ctx) => {
          if (id === undefined) {
            await runComponent(ctx, 'stack');
          } else {
            printHeading(`Installing ${COMPONENTS.stack.label.toLowerCase()}...`);
            const report = await ctx.installer.installStackPreset(id);
            printReport(report, ctx.targetRoot);
          }
          printDone();
        });
      } catch (error) {
        fail(error);
      }
    });
}

export function createAllCommand(deps: CliDependencies): Command {
  return new Command('all')
    .description('Install skills, agents, hooks, rules and security')
    .action(async (_options: object, command: Command) => {
      try {
        await withContext(command, deps, async (ctx) => {
          await runAll(ctx);
          printDone();
        });
      } catch (error) {
        fail(error);
      }
    });
}

/**
 * `skill <name>` and `agent <name>`.
 */
export function createItemCommand(kind: CatalogKind, deps: CliDependencies): Command {
  return new Command(kind)
    .description(`Install a specific ${kind}`)
    .argument('<name>', `Name of the ${kind}`)
    .action(async (itemName: string, _options: object, command: Command) => {
      try {
        await withContext(command, deps, async (ctx) => {
          printHeading(`Installing ${kind}: ${itemName}`);
          await runSingleItem(ctx, kind, itemName);
          printDone();
        });
      } catch (error) {
        fail(error);
      }
    });
}

export function createStatusCommand(deps: CliDependencies): Command {
  return new Command('status')
    .description('Show which components are installed')
    .action(async (_options: object, command: Command) => {
      try {
        await withContext(command, deps, runStatus);
      } catch (error) {
        fail(error);
      }
    });
}

/**
 * Every install command, in help order.
 */
export function createInstallCommands(deps: CliDependencies): Command[] {
  const components = COMPONENT_NAMES.filter((name) => name !== 'stack').map((name) =>
    createComponentCommand(name, deps)
  );
  return [
    ...components,
    createStackCommand(deps),
    createAllCommand(deps),
    createItemCommand('skill', deps),
    createItemCommand('agent', deps),
    createStatusCommand(deps),
  ];
}

/**
 * Interactive menu shown when `adopt` runs without arguments.
 * One choice is dispatched per run; the process then exits.
 */
import chalk from 'chalk';
import { COMPONENTS } from '../../core/catalog/components.js';
import { COMPONENT_NAMES, type CatalogKind, type ComponentName } from '../../core/catalog/types.js';
import { ErrorCodes, ValidationError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import type { CliContext } from '../context.js';
import { formatStatusLines } from '../formatters/report.js';
import { runAll, runComponent, runSingleItem, settingsLabel } from './install.js';

export type MenuChoice =
  | { type: 'component'; name: ComponentName }
  | { type: 'everything' }
  | { type: 'single'; kind: CatalogKind }
  | { type: 'quit' };

const EVERYTHING_KEY = String(COMPONENT_NAMES.length + 1);
const RULE = '━'.repeat(72);
const LABEL_WIDTH = 14;

/**
 * Map a menu answer to a choice, or null when it matches no option.
 */
export function parseMenuChoice(input: string): MenuChoice | null {
  const answer = input.trim();
  const index = Number.parseInt(answer, 10);
  if (String(index) === answer && index >= 1 && index <= COMPONENT_NAMES.length) {
    const name = COMPONENT_NAMES[index - 1];
    return name ? { type: 'component', name } : null;
  }

  switch (answer.toLowerCase()) {
    case EVERYTHING_KEY:
      return { type: 'everything' };
    case 's':
      return { type: 'single', kind: 'skill' };
    case 'a':
      return { type: 'single', kind: 'agent' };
    case 'q':
      return { type: 'quit' };
    default:
      return null;
  }
}

function option(key: string, label: string, summary: string): string {
  return `    ${key}) ${label.padEnd(LABEL_WIDTH)}- ${summary}`;
}

/**
 * Menu text: banner, target, current status and the options.
 */
export function renderMenu(targetRoot: string, statusLines: readonly string[]): string {
  return [
    '',
    chalk.blue(RULE),
    chalk.blue('  Adopt Components'),
    chalk.blue(RULE),
    '',
    `  ${chalk.bold('Target:')} ${targetRoot}`,
    '',
    `  ${chalk.bold('Current Status:')}`,
    ...statusLines,
    '',
    `  ${chalk.bold('What would you like to adopt?')}`,
    '',
    ...COMPONENT_NAMES.map((name, i) =>
      option(String(i + 1), COMPONENTS[name].label, COMPONENTS[name].description)
    ),
    option(EVERYTHING_KEY, 'Everything', 'Install all components'),
    '',
    option('s', 'Single skill', 'Install one specific skill'),
    option('a', 'Single agent', 'Install one specific agent'),
    '',
    '    q) Quit',
    '',
  ].join('\n');
}

async function chooseSingleItem(ctx: CliContext, kind: CatalogKind): Promise<void> {
  const names = await ctx.installer.listCatalog(kind);
  console.log(`  Available ${kind}s:`);
  for (const name of names) {
    console.log(`    - ${name}`);
  }
  console.log();

  const label = kind === 'skill' ? 'Skill' : 'Agent';
  const itemName = await ctx.prompter.ask(`  ${label} name: `);
  await runSingleItem(ctx, kind, itemName);
}

/**
 * Show the menu, read one choice and run it.
 *
 * @throws ValidationError when the answer matches no option
 */
export async function runInteractive(ctx: CliContext): Promise<void> {
  const status = await ctx.installer.getInstallationStatus();
  console.log(renderMenu(ctx.targetRoot, formatStatusLines(status, settingsLabel(ctx))));

  const answer = await ctx.prompter.ask('  Select option: ');
  console.log();

  const choice = parseMenuChoice(answer);
  if (!choice) {
    throw new ValidationError(ErrorCodes.INVALID_MENU_CHOICE, 'Invalid option', { answer });
  }

  switch (choice.type) {
    case 'quit':
      return;
    case 'component':
      await runComponent(ctx, choice.name);
      break;
    case 'everything': {
      await runAll(ctx);
      console.log();
      if (await ctx.prompter.confirm('  Also install pre-commit review hook?', false)) {
        await runComponent(ctx, 'precommit');
      }
      break;
    }
    case 'single':
      await chooseSingleItem(ctx, choice.kind);
      break;
  }

  console.log();
  log.success('Done!');
  console.log();
}

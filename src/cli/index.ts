import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { COMPONENT_NAMES } from '../core/catalog/types.js';
import { ErrorCodes, ValidationError } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';
import { getUsageHelp } from './commands/help.js';
import { createInstallCommands } from './commands/install.js';
import { runInteractive } from './commands/interactive.js';
import { defaultDependencies, withContext, type CliDependencies } from './context.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PACKAGE_ROOT = resolve(__dirname, '../..');
const VERSION = readVersion(resolve(PACKAGE_ROOT, 'package.json'));

/** Distribution shipped with the package. */
export const DEFAULT_SOURCE_ROOT = resolve(PACKAGE_ROOT, 'starter');

function readVersion(packageJsonPath: string): string {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

export function getVersion(): string {
  return VERSION;
}

/** Create the CLI program. */
export function createCli(deps: CliDependencies = defaultDependencies(DEFAULT_SOURCE_ROOT)): Command {
  const program = new Command()
    .name('adopt')
    .description('Copy starter components into an existing project')
    .version(VERSION)
    .option('--target <dir>', 'Project to install into')
    .option('--source <dir>', 'Starter distribution to copy from')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show errors')
    .argument('[component]')
    // A default action hides the implicit help subcommand
    .helpCommand(true)
    .configureHelp({
      formatHelp: () => getUsageHelp(VERSION),
    })
    .action(async (component: string | undefined, _options: object, command: Command) => {
      try {
        if (component !== undefined) {
          // Reached only for names no subcommand matched
          throw new ValidationError(ErrorCodes.INVALID_COMPONENT_NAME, `Unknown component: ${component}`, {
            name: component,
            valid: [...COMPONENT_NAMES, 'all', 'skill', 'agent', 'status'],
          });
        }
        await withContext(command, deps, runInteractive);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        if (error instanceof ValidationError && error.code === ErrorCodes.INVALID_COMPONENT_NAME) {
          console.log("Run 'adopt --help' for usage.");
        }
        process.exit(1);
      }
    });

  createInstallCommands(deps).forEach((cmd) => program.addCommand(cmd));
  return program;
}

/**
 * Usage text shown for `adopt --help`, `adopt -h` and `adopt help`.
 */
import chalk from 'chalk';
import { COMPONENTS } from '../../core/catalog/components.js';
import { COMPONENT_NAMES } from '../../core/catalog/types.js';

const COMMAND_WIDTH = 16;

function row(command: string, summary: string): string {
  return `  ${command.padEnd(COMMAND_WIDTH)}${summary}`;
}

export function getUsageHelp(version: string): string {
  const lines = [
    `${chalk.bold('adopt')} ${chalk.dim(`v${version}`)}`,
    '',
    'Usage: adopt [options] [component]',
    '',
    chalk.bold('Components:'),
    ...COMPONENT_NAMES.map(name => row(name, COMPONENTS[name].description)),
    row('all', 'Install skills, agents, hooks, rules and security'),
    '',
    row('skill <name>', 'Install a specific skill'),
    row('agent <name>', 'Install a specific agent'),
    row('status', 'Show which components are installed'),
    '',
    chalk.bold('Options:'),
    row('--target <dir>', 'Project to install into (default: current directory)'),
    row('--source <dir>', 'Starter distribution to copy from'),
    row('--verbose', 'Show debug output'),
    row('--quiet', 'Only show errors'),
    row('-V, --version', 'Print version'),
    row('-h, --help', 'Show this help'),
    '',
    'Without arguments, runs interactive mode.',
    '',
  ];
  return lines.join('\n');
}

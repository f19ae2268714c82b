/**
 * Tests for the install commands.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createCli } from '../../../../src/cli/index.js';
import { createInstallCommands } from '../../../../src/cli/commands/install.js';
import type { CliDependencies } from '../../../../src/cli/context.js';
import { logger } from '../../../../src/utils/logger.js';
import {
  ScriptedPrompter,
  createDistribution,
  exists,
  makeTempDir,
  readText,
  snapshotTree,
  writeTree,
} from '../../../fixtures/distribution.js';

vi.mock('../../../../src/utils/logger.js', () => {
  const log = {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    fail: vi.fn(),
    debug: vi.fn(),
    setLevel: vi.fn(),
    child: () => log,
  };
  return { logger: log };
});

// Mock chalk with pass-through
vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    green: (s: string) => s,
    blue: (s: string) => s,
  },
}));

describe('install commands', () => {
  let sourceRoot: string;
  let targetRoot: string;
  let prompter: ScriptedPrompter;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let processExitSpy: MockInstance<typeof process.exit>;

  const deps = (answers: string[] = []): CliDependencies => {
    prompter = new ScriptedPrompter(answers);
    return {
      defaultSourceRoot: sourceRoot,
      cwd: () => targetRoot,
      createPrompter: () => prompter,
    };
  };

  const run = (args: string[], answers: string[] = []): Promise<unknown> =>
    createCli(deps(answers)).parseAsync(['node', 'adopt', ...args]);

  beforeEach(async () => {
    vi.clearAllMocks();
    sourceRoot = await makeTempDir('cli-src');
    targetRoot = await makeTempDir('cli-dst');
    await createDistribution(sourceRoot);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    await fs.rm(sourceRoot, { recursive: true, force: true });
    await fs.rm(targetRoot, { recursive: true, force: true });
  });

  describe('createInstallCommands', () => {
    it('should create every command', () => {
      const names = createInstallCommands(deps()).map((command) => command.name());

      expect(names).toEqual([
        'skills',
        'agents',
        'hooks',
        'rules',
        'precommit',
        'security',
        'stack',
        'all',
        'skill',
        'agent',
        'status',
      ]);
    });
  });

  describe('component commands', () => {
    it('should install a component and report each item', async () => {
      await run(['skills']);

      expect(logger.success).toHaveBeenCalledWith('Installed skill: review');
      expect(logger.success).toHaveBeenCalledWith('Installed skill: test');
      expect(logger.success).toHaveBeenLastCalledWith('Done!');
      expect(await exists(path.join(targetRoot, '.claude', 'skills', 'test', 'SKILL.md'))).toBe(true);
      expect(processExitSpy).not.toHaveBeenCalled();
    });

    it('should warn about existing items on a second run', async () => {
      await run(['skills']);
      vi.clearAllMocks();

      await run(['skills']);

      expect(logger.warn).toHaveBeenCalledWith(
        `Skill 'review' already exists at ${path.join('.claude', 'skills', 'review')}, skipping`
      );
      expect(processExitSpy).not.toHaveBeenCalled();
    });

    it('should install into --target', async () => {
      const other = path.join(targetRoot, 'nested');
      await fs.mkdir(other);

      await run(['agents', '--target', other]);

      expect(await exists(path.join(other, '.claude', 'agents', 'reviewer.md'))).toBe(true);
    });

    it('should exit 1 when the component source is missing', async () => {
      await fs.rm(path.join(sourceRoot, '.claude', 'rules'), { recursive: true });

      await expect(run(['rules'])).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith(
        `No rules found in distribution (${path.join(sourceRoot, '.claude', 'rules')})`
      );
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('should exit 1 for precommit outside a git repository', async () => {
      await expect(run(['precommit'])).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith("Not a git repository. Run 'git init' first.");
      expect(await snapshotTree(targetRoot)).toEqual({});
    });

    it('should release the prompter after the command', async () => {
      await run(['rules']);

      expect(prompter.closed).toBe(true);
    });
  });

  describe('stack', () => {
    it('should install the named stack', async () => {
      await run(['stack', 'typescript']);

      expect(await readText(path.join(targetRoot, '.claude', 'rules', 'typescript.md'))).toBe(
        'typescript rules\n'
      );
      expect(prompter.questions).toEqual([]);
    });

    it('should keep existing settings when the user declines', async () => {
      await writeTree(targetRoot, { '.claude/settings.json': '{"mine":true}' });

      await run(['stack', 'typescript'], ['n']);

      expect(logger.info).toHaveBeenCalledWith(`Kept existing ${path.join('.claude', 'settings.json')}`);
      expect(await readText(path.join(targetRoot, '.claude', 'settings.json'))).toBe('{"mine":true}');
    });

    it('should prompt for the stack when no id is given', async () => {
      await run(['stack'], ['python']);

      expect(await exists(path.join(targetRoot, '.claude', 'rules', 'python.md'))).toBe(true);
    });

    it('should exit 1 for an unknown stack', async () => {
      await expect(run(['stack', 'java'])).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith('Unknown stack: java');
    });
  });

  describe('all', () => {
    it('should install the sequence and print totals', async () => {
      await run(['all']);

      expect(logger.info).toHaveBeenCalledWith('10 installed, 3 skipped, 0 failed');
      expect(await exists(path.join(targetRoot, '.git'))).toBe(false);
    });

    it('should keep going when one step cannot run', async () => {
      await fs.rm(path.join(sourceRoot, '.claude', 'agents'), { recursive: true });

      await run(['all']);

      expect(logger.fail).toHaveBeenCalledWith(
        `Agents: No agents found in distribution (${path.join(sourceRoot, '.claude', 'agents')})`
      );
      expect(await exists(path.join(targetRoot, '.claude', 'rules', 'security.md'))).toBe(true);
      expect(processExitSpy).not.toHaveBeenCalled();
    });
  });

  describe('skill and agent', () => {
    it('should install one agent', async () => {
      await run(['agent', 'researcher']);

      expect(logger.success).toHaveBeenCalledWith('Installed agent: researcher.md');
      expect(await exists(path.join(targetRoot, '.claude', 'agents', 'reviewer.md'))).toBe(false);
    });

    it('should list the available skills for an unknown name', async () => {
      await expect(run(['skill', 'nonexistent'])).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith("Skill 'nonexistent' not found");
      expect(consoleLogSpy).toHaveBeenCalledWith('  Available skills:');
      expect(consoleLogSpy).toHaveBeenCalledWith('    - review');
      expect(consoleLogSpy).toHaveBeenCalledWith('    - test');
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('should reject path traversal without writing', async () => {
      await expect(run(['skill', '../../etc'])).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith("Invalid skill name: '../../etc' (no paths allowed)");
      expect(await snapshotTree(targetRoot)).toEqual({});
    });
  });

  describe('status', () => {
    it('should print the status of each component', async () => {
      await writeTree(targetRoot, { '.claude/skills/review/SKILL.md': 'x' });

      await run(['status']);

      expect(consoleLogSpy).toHaveBeenCalledWith('    ○ CLAUDE.md');
      expect(consoleLogSpy).toHaveBeenCalledWith('    ○ .claude/settings.json');
      expect(consoleLogSpy).toHaveBeenCalledWith('    ✓ Skills');
      expect(consoleLogSpy).toHaveBeenCalledWith('    ○ Pre-commit review');
    });
  });
});

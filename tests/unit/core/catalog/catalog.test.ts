/**
 * Tests for the live catalog.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import {
  findCatalogItem,
  findStackFiles,
  listCatalog,
  listItems,
  resolveComponent,
  resolveLayout,
  type DistributionLayout,
} from '../../../../src/core/catalog/catalog.js';
import { CatalogError } from '../../../../src/utils/errors.js';
import { createDistribution, makeTempDir } from '../../../fixtures/distribution.js';

describe('catalog', () => {
  let sourceRoot: string;
  let targetRoot: string;
  let layout: DistributionLayout;

  beforeEach(async () => {
    sourceRoot = await makeTempDir('catalog-src');
    targetRoot = await makeTempDir('catalog-dst');
    await createDistribution(sourceRoot);
    layout = resolveLayout(sourceRoot, targetRoot, getDefaultConfig());
  });

  afterEach(async () => {
    await fs.rm(sourceRoot, { recursive: true, force: true });
    await fs.rm(targetRoot, { recursive: true, force: true });
  });

  describe('resolveLayout', () => {
    it('should place config directories under both roots', () => {
      expect(layout.sourceConfigDir).toBe(path.join(sourceRoot, '.claude'));
      expect(layout.targetConfigDir).toBe(path.join(targetRoot, '.claude'));
      expect(layout.stacksDir).toBe(path.join(sourceRoot, 'stacks'));
      expect(layout.targetSettingsFile).toBe(path.join(targetRoot, '.claude', 'settings.json'));
    });

    it('should honor configured directory names', () => {
      const config = { ...getDefaultConfig(), target_dir: '.agent', settings_file: 'config.json' };
      const custom = resolveLayout(sourceRoot, targetRoot, config);

      expect(custom.targetSettingsFile).toBe(path.join(targetRoot, '.agent', 'config.json'));
    });
  });

  describe('listItems', () => {
    it('should list skill directories', async () => {
      const items = await listItems(resolveComponent('skills', layout));

      expect(items.map((item) => item.itemName)).toEqual(['review', 'test']);
      expect(items[0]).toEqual({
        itemName: 'review',
        sourceFile: path.join(sourceRoot, '.claude', 'skills', 'review'),
        destFile: path.join(targetRoot, '.claude', 'skills', 'review'),
        isDirectory: true,
        executable: false,
      });
    });

    it('should list hook scripts as executable and honor exclusions', async () => {
      const items = await listItems(resolveComponent('hooks', layout), ['pre-commit-review.sh']);

      expect(items.map((item) => item.itemName)).toEqual(['format.sh', 'validate-bash.sh']);
      expect(items.every((item) => item.executable)).toBe(true);
    });

    it('should only match the component pattern', async () => {
      await fs.writeFile(path.join(sourceRoot, '.claude', 'agents', 'notes.txt'), 'x');

      const items = await listItems(resolveComponent('agents', layout));

      expect(items.map((item) => item.itemName)).toEqual(['researcher.md', 'reviewer.md']);
    });

    it('should throw a CatalogError when the source directory is missing', async () => {
      await fs.rm(path.join(sourceRoot, '.claude', 'rules'), { recursive: true });

      await expect(listItems(resolveComponent('rules', layout))).rejects.toBeInstanceOf(CatalogError);
    });

    it('should throw for composite components', async () => {
      await expect(listItems(resolveComponent('security', layout))).rejects.toBeInstanceOf(CatalogError);
    });
  });

  describe('listCatalog', () => {
    it('should list skills by directory name', async () => {
      expect(await listCatalog('skill', layout)).toEqual(['review', 'test']);
    });

    it('should list agents without their extension', async () => {
      expect(await listCatalog('agent', layout)).toEqual(['researcher', 'reviewer']);
    });

    it('should reflect files added after startup', async () => {
      await fs.mkdir(path.join(sourceRoot, '.claude', 'skills', 'deploy'));

      expect(await listCatalog('skill', layout)).toEqual(['deploy', 'review', 'test']);
    });

    it('should return an empty list when the collection is missing', async () => {
      await fs.rm(path.join(sourceRoot, '.claude', 'agents'), { recursive: true });

      expect(await listCatalog('agent', layout)).toEqual([]);
    });
  });

  describe('findCatalogItem', () => {
    it('should find an agent by name', async () => {
      const item = await findCatalogItem('agent', 'reviewer', layout);

      expect(item).toEqual({
        itemName: 'reviewer.md',
        sourceFile: path.join(sourceRoot, '.claude', 'agents', 'reviewer.md'),
        destFile: path.join(targetRoot, '.claude', 'agents', 'reviewer.md'),
        isDirectory: false,
        executable: false,
      });
    });

    it('should only find skills that are directories', async () => {
      await fs.writeFile(path.join(sourceRoot, '.claude', 'skills', 'loose'), 'x');

      expect(await findCatalogItem('skill', 'loose', layout)).toBeNull();
      expect(await findCatalogItem('skill', 'review', layout)).not.toBeNull();
    });

    it('should return null for unknown names', async () => {
      expect(await findCatalogItem('agent', 'nonexistent', layout)).toBeNull();
    });
  });

  describe('findStackFiles', () => {
    it('should locate every file of a full preset', async () => {
      const files = await findStackFiles('typescript', layout, 'settings.json');

      expect(files).toEqual({
        rules: path.join(sourceRoot, 'stacks', 'typescript', 'rules.md'),
        settings: path.join(sourceRoot, 'stacks', 'typescript', 'settings.json'),
        template: path.join(sourceRoot, 'stacks', 'typescript', 'CLAUDE.md'),
      });
    });

    it('should report missing files as null', async () => {
      const files = await findStackFiles('python', layout, 'settings.json');

      expect(files).toEqual({
        rules: path.join(sourceRoot, 'stacks', 'python', 'rules.md'),
        settings: null,
        template: null,
      });
    });
  });
});

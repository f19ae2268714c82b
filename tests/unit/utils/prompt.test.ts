/**
 * Tests for terminal prompts.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { ReadlinePrompter, parseConfirmation } from '../../../src/utils/prompt.js';

describe('parseConfirmation', () => {
  it.each([
    ['y', true],
    ['Yes', true],
    ['n', false],
    ['NO', false],
  ])('should read %s as %s', (answer, expected) => {
    expect(parseConfirmation(answer, !expected)).toBe(expected);
  });

  it('should fall back to the default for anything else', () => {
    expect(parseConfirmation('', false)).toBe(false);
    expect(parseConfirmation('', true)).toBe(true);
    expect(parseConfirmation('maybe', false)).toBe(false);
  });
});

describe('ReadlinePrompter', () => {
  let input: PassThrough;
  let output: PassThrough;
  let written: string;
  let prompter: ReadlinePrompter;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    prompter = new ReadlinePrompter(input, output);
  });

  afterEach(() => {
    prompter.close();
  });

  it('should resolve with the trimmed answer', async () => {
    const answer = prompter.ask('Name: ');
    input.write('  review  \n');

    expect(await answer).toBe('review');
    expect(written).toContain('Name: ');
  });

  it('should append the default hint to confirmations', async () => {
    const answer = prompter.confirm('Replace settings.json?', false);
    input.write('y\n');

    expect(await answer).toBe(true);
    expect(written).toContain('Replace settings.json? [y/N]: ');
  });

  it('should use the default on an empty confirmation', async () => {
    const answer = prompter.confirm('Continue?', true);
    input.write('\n');

    expect(await answer).toBe(true);
    expect(written).toContain('Continue? [Y/n]: ');
  });

  it('should answer with an empty string once input ends', async () => {
    const answer = prompter.ask('Choice: ');
    input.end();

    expect(await answer).toBe('');
    expect(await prompter.ask('Again: ')).toBe('');
  });

  it('should keep piped lines for later questions', async () => {
    input.end('7\n3\n');

    expect(await prompter.ask('Select option: ')).toBe('7');
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(await prompter.ask('Select stack: ')).toBe('3');
    expect(await prompter.ask('Anything else: ')).toBe('');
    expect(written).toContain('Select stack: ');
  });

  it('should answer a confirmation from a queued line', async () => {
    input.end('8\ny\n');

    expect(await prompter.ask('Select option: ')).toBe('8');
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(await prompter.confirm('Also install pre-commit review hook?')).toBe(true);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { NaturalLanguageShell } from '../src/engine/ai/natural-shell';
import { parseRuleTable } from '../src/engine/ai/rules';
import { createTempDir, removeTempDir, createTestShell } from './helpers/shell';

describe('NaturalLanguageShell', () => {
  let dir: string;
  let natural: NaturalLanguageShell;

  beforeEach(() => {
    dir = createTempDir();
    natural = new NaturalLanguageShell(createTestShell(dir));
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should start with interpretation enabled', () => {
    expect(natural.interpretationEnabled).toBe(true);
  });

  it('should run the interpreted command', async () => {
    const result = await natural.run('create a file named notes.txt');
    expect(result.output).toBe('Touched: notes.txt');
    expect(result.exitCode).toBe(0);
    expect(result.outcome.stage).toBe('pattern');
    expect(fs.existsSync(path.join(dir, 'notes.txt'))).toBe(true);
  });

  it('should run every step of a multi-step phrase', async () => {
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'x');
    const result = await natural.run('create a folder called docs and move notes.txt into it');
    expect(result.output).toBe('Created directory: docs\nMoved: notes.txt -> docs/');
    expect(fs.existsSync(path.join(dir, 'docs', 'notes.txt'))).toBe(true);
  });

  it('should record the interpreted line in history', async () => {
    await natural.run('where am i');
    expect(natural.engine.session.history).toEqual(['pwd']);
  });

  it('should run phrases as typed when disabled', async () => {
    expect(natural.toggle()).toBe(false);
    const result = await natural.run('echo create a file named x.txt');
    expect(result.outcome).toEqual({
      commandLine: 'echo create a file named x.txt',
      explanation: 'No interpretation found, executing as-is',
      stage: 'passthrough'
    });
    expect(result.output).toBe('create a file named x.txt');
    expect(fs.existsSync(path.join(dir, 'x.txt'))).toBe(false);
    expect(natural.toggle()).toBe(true);
  });

  it('should use a custom rule table', async () => {
    const rules = parseRuleTable(`
multiStep: []
categories:
  - category: greet
    patterns: ['^hello$']
    template: 'echo hi'
`);
    const custom = new NaturalLanguageShell(createTestShell(dir), rules);
    const result = await custom.run('hello');
    expect(result.output).toBe('hi');
    expect(result.outcome.category).toBe('greet');
  });
});

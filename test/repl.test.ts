import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { PassThrough, Readable } from 'node:stream';
import { Repl, splitExit, type ReplMode } from '../src/cli/repl';
import { EXIT_SENTINEL } from '../src/engine/builtins/exit';
import { NATURAL_LANGUAGE_HELP } from '../src/engine/ai/natural-shell';
import { HistoryFile } from '../src/persistence/history';
import type { ShellEngine } from '../src/engine/shell';
import { createTempDir, removeTempDir, createTestShell } from './helpers/shell';

describe('splitExit', () => {
  it('should detect a bare sentinel', () => {
    expect(splitExit(EXIT_SENTINEL)).toEqual({ text: '', exit: true });
  });

  it('should keep the output before a trailing sentinel', () => {
    expect(splitExit(`bye\n${EXIT_SENTINEL}`)).toEqual({ text: 'bye', exit: true });
  });

  it('should leave other output alone', () => {
    expect(splitExit('hello')).toEqual({ text: 'hello', exit: false });
  });
});

describe('Repl', () => {
  let dir: string;
  let engine: ShellEngine;
  let written: string[];

  const createRepl = (mode: ReplMode, history?: HistoryFile) =>
    new Repl({ mode, engine, history, write: text => written.push(text) });

  beforeEach(() => {
    dir = createTempDir();
    engine = createTestShell(dir);
    written = [];
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  describe('cli mode', () => {
    it('should show the engine prompt', () => {
      expect(createRepl('cli').prompt).toBe(`tester@testhost:${path.basename(dir)}$ `);
    });

    it('should print command output', async () => {
      const repl = createRepl('cli');
      expect(await repl.handleLine('pwd')).toBe(true);
      expect(written).toEqual([`${dir}\n`]);
    });

    it('should ignore blank lines', async () => {
      expect(await createRepl('cli').handleLine('   ')).toBe(true);
      expect(written).toEqual([]);
      expect(engine.session.history).toEqual([]);
    });

    it('should stop on exit after printing earlier output', async () => {
      const repl = createRepl('cli');
      expect(await repl.handleLine('exit')).toBe(false);
      expect(await repl.handleLine('echo bye && quit')).toBe(false);
      expect(written).toEqual(['bye\n']);
    });

    it('should run phrases as commands', async () => {
      await createRepl('cli').handleLine('where am i');
      expect(engine.session.history).toEqual(['where am i']);
    });

    it('should toggle interpretation', async () => {
      const repl = createRepl('cli');
      await repl.handleLine('toggle ai');
      expect(written).toEqual(['AI interpretation enabled\n']);
      expect(repl.prompt).toBe(`AI tester@testhost:${path.basename(dir)}$ `);
      await repl.handleLine('TOGGLE AI');
      expect(written[1]).toBe('AI interpretation disabled\n');
    });

    it('should show the command banner', () => {
      expect(createRepl('cli').banner()).toBe(
        "natterm - Type 'help' for available commands\nUse Ctrl+C to interrupt, 'exit' or 'quit' to exit\n\n"
      );
    });
  });

  describe('ai mode', () => {
    it('should print the interpretation before the output', async () => {
      await createRepl('ai').handleLine('where am i');
      expect(written).toEqual(["✓ Interpreted 'where am i' as 'pwd'\n", `${dir}\n`]);
    });

    it('should not announce a passthrough', async () => {
      await createRepl('ai').handleLine('echo xyzzy');
      expect(written).toEqual(['xyzzy\n']);
    });

    it('should print the natural-language help', async () => {
      await createRepl('ai').handleLine('ai help');
      expect(written).toEqual([NATURAL_LANGUAGE_HELP + '\n']);
      expect(engine.session.history).toEqual([]);
    });
  });

  describe('completer', () => {
    it('should complete the last word of the line', () => {
      fs.writeFileSync(path.join(dir, 'data.csv'), '');
      const repl = createRepl('cli');
      expect(repl.completer('cat da')).toEqual([['data.csv'], 'da']);
      expect(repl.completer('mkd')).toEqual([['mkdir'], 'mkd']);
    });

    it('should offer phrase starters in ai mode', () => {
      const repl = createRepl('ai');
      expect(repl.completer('create a')).toEqual([['create a file named', 'create a folder named'], 'create a']);
      expect(repl.completer('cat zz')).toEqual([[], 'zz']);
    });

    it('should not offer phrase starters in cli mode', () => {
      expect(createRepl('cli').completer('create a')).toEqual([[], 'a']);
    });
  });

  describe('run', () => {
    it('should read lines until exit and save the history', async () => {
      const historyFile = new HistoryFile(path.join(dir, 'history'));
      const repl = createRepl('cli', historyFile);
      const output = new PassThrough();
      output.resume();

      await repl.run(Readable.from(['echo hi\n', 'exit\n', 'echo never\n']), output);

      expect(written).toEqual(['hi\n']);
      expect(fs.readFileSync(path.join(dir, 'history'), 'utf-8')).toBe('echo hi\nexit\n');
    });

    it('should say goodbye at end of input', async () => {
      const output = new PassThrough();
      output.resume();

      await createRepl('cli').run(Readable.from(['echo hi\n']), output);

      expect(written).toEqual(['hi\n', '\nGoodbye!\n']);
    });
  });
});

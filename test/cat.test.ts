import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { cat, echo } from '../src/engine/builtins/filesystem';
import type { ExecutionContext } from '../src/engine/types';
import { createTempDir, removeTempDir, createTestContext } from './helpers/shell';

describe('cat', () => {
  let dir: string;
  let context: ExecutionContext;

  beforeEach(() => {
    dir = createTempDir();
    context = createTestContext(dir);
    fs.writeFileSync(path.join(dir, 'a.txt'), 'first\nsecond\n');
    fs.writeFileSync(path.join(dir, 'b.txt'), 'other');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should require a file', async () => {
    expect(await cat([], context)).toEqual({ ok: false, error: { kind: 'usage', message: 'Usage: cat <filename>' } });
  });

  it('should print a file unchanged', async () => {
    expect(await cat(['a.txt'], context)).toEqual({ ok: true, output: 'first\nsecond\n' });
  });

  it('should print headers for several files', async () => {
    expect(await cat(['a.txt', 'b.txt'], context)).toEqual({
      ok: true,
      output: '==> a.txt <==\nfirst\nsecond\n\n==> b.txt <==\nother'
    });
  });

  it('should report a missing file and keep going', async () => {
    expect(await cat(['missing.txt', 'b.txt'], context)).toEqual({
      ok: false,
      error: { kind: 'not_found', message: 'File not found: missing.txt\n==> b.txt <==\nother' }
    });
  });

  it('should refuse a directory', async () => {
    fs.mkdirSync(path.join(dir, 'sub'));
    expect(await cat(['sub'], context)).toEqual({ ok: false, error: { kind: 'conflict', message: 'Is a directory: sub' } });
  });

  it('should refuse binary content', async () => {
    fs.writeFileSync(path.join(dir, 'blob.bin'), Buffer.from([0x89, 0x50, 0x00, 0x01]));
    expect(await cat(['blob.bin'], context)).toEqual({
      ok: false,
      error: { kind: 'invalid_argument', message: 'Cannot display binary file: blob.bin' }
    });
  });

  it('should refuse invalid UTF-8', async () => {
    fs.writeFileSync(path.join(dir, 'latin1.txt'), Buffer.from([0x63, 0x61, 0x66, 0xe9]));
    const result = await cat(['latin1.txt'], context);
    expect(result.ok).toBe(false);
  });
});

describe('echo', () => {
  it('should join arguments with spaces', async () => {
    const dir = createTempDir();
    try {
      expect(await echo(['hello', 'big world'], createTestContext(dir))).toEqual({ ok: true, output: 'hello big world' });
      expect(await echo([], createTestContext(dir))).toEqual({ ok: true, output: '' });
    } finally {
      removeTempDir(dir);
    }
  });
});

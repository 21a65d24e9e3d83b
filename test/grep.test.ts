import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { grep } from '../src/engine/builtins/filesystem';
import type { ExecutionContext } from '../src/engine/types';
import { createTempDir, removeTempDir, createTestContext } from './helpers/shell';

describe('grep', () => {
  let dir: string;
  let context: ExecutionContext;

  beforeEach(() => {
    dir = createTempDir();
    context = createTestContext(dir);
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'alpha\nTODO: write tests   \nbeta\ntodo lowercase\nTODO again\n');
    fs.writeFileSync(path.join(dir, 'plan.txt'), 'nothing here\nTODO ship\n');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should require a pattern and a file', async () => {
    expect(await grep(['TODO'], context)).toEqual({
      ok: false,
      error: { kind: 'usage', message: 'Usage: grep <pattern> <file>' }
    });
  });

  it('should print matching lines with numbers, case-sensitively', async () => {
    expect(await grep(['TODO', 'notes.txt'], context)).toEqual({
      ok: true,
      output: '2: TODO: write tests\n5: TODO again'
    });
  });

  it('should treat the pattern literally', async () => {
    expect(await grep(['a.', 'notes.txt'], context)).toEqual({
      ok: true,
      output: "No matches found for 'a.'"
    });
  });

  it('should prefix file names when searching several files', async () => {
    expect(await grep(['TODO', 'notes.txt', 'plan.txt'], context)).toEqual({
      ok: true,
      output: 'notes.txt:2: TODO: write tests\nnotes.txt:5: TODO again\nplan.txt:2: TODO ship'
    });
  });

  it('should report no matches', async () => {
    expect(await grep(['zzz', 'notes.txt'], context)).toEqual({ ok: true, output: "No matches found for 'zzz'" });
  });

  it('should report a missing file without a no-match line', async () => {
    expect(await grep(['TODO', 'missing.txt'], context)).toEqual({
      ok: false,
      error: { kind: 'not_found', message: 'File not found: missing.txt' }
    });
  });
});

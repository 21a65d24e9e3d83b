import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { complete, MAX_COMPLETIONS } from '../src/engine/completion';
import type { Session } from '../src/engine/session';
import { createTempDir, removeTempDir, createTestSession } from './helpers/shell';

describe('complete', () => {
  let dir: string;
  let session: Session;

  beforeEach(() => {
    dir = createTempDir();
    fs.mkdirSync(path.join(dir, 'docs'));
    fs.writeFileSync(path.join(dir, 'docs', 'inner.md'), '');
    fs.writeFileSync(path.join(dir, 'draft.txt'), '');
    fs.writeFileSync(path.join(dir, 'data.csv'), '');
    fs.writeFileSync(path.join(dir, '.env'), '');
    session = createTestSession(dir);
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  describe('command position', () => {
    it('should complete builtin names', () => {
      expect(complete(session, 'mk', 'mk')).toEqual(['mkdir']);
    });

    it('should include common tools', () => {
      expect(complete(session, 'p', 'p')).toEqual(['pip', 'ps', 'pwd', 'python']);
      expect(complete(session, 'g', 'g')).toEqual(['gcc', 'git', 'grep']);
    });

    it('should cap an empty prefix at ten sorted names', () => {
      expect(complete(session, '', '')).toEqual([
        'alias', 'cat', 'cd', 'clear', 'cls', 'copy', 'cp', 'date', 'del', 'df'
      ]);
    });

    it('should return nothing for unknown prefixes', () => {
      expect(complete(session, 'zz', 'zz')).toEqual([]);
    });
  });

  describe('paths', () => {
    it('should complete names in the working directory', () => {
      expect(complete(session, 'd', 'cat d')).toEqual(['data.csv', 'docs/', 'draft.txt']);
    });

    it('should list everything, dot-entries included, after a command', () => {
      expect(complete(session, '', 'cat ')).toEqual(['.env', 'data.csv', 'docs/', 'draft.txt']);
    });

    it('should keep the typed directory', () => {
      expect(complete(session, 'docs/', 'cd docs/')).toEqual(['docs/inner.md']);
      expect(complete(session, `${dir}/dr`, `cat ${dir}/dr`)).toEqual([`${dir}/draft.txt`]);
    });

    it('should expand ~ against HOME', () => {
      expect(complete(session, '~/da', 'cat ~/da')).toEqual(['~/data.csv']);
    });

    it('should return nothing for a missing directory', () => {
      expect(complete(session, 'nope/x', 'cat nope/x')).toEqual([]);
    });

    it('should return at most ten candidates', () => {
      for (let i = 0; i < 12; i++) {
        fs.writeFileSync(path.join(dir, `f${String(i).padStart(2, '0')}`), '');
      }
      const candidates = complete(session, 'f', 'rm f');
      expect(candidates).toHaveLength(MAX_COMPLETIONS);
      expect(candidates[0]).toBe('f00');
      expect(candidates[9]).toBe('f09');
    });
  });
});

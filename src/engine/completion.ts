/**
 * @fileoverview Tab-completion candidates for command lines.
 *
 * @module engine/completion
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Session } from './session';
import { BUILTIN_NAMES } from './builtins';

export const MAX_COMPLETIONS = 10;

/** Common external tools offered in command position. */
export const COMMON_TOOLS = ['python', 'git', 'npm', 'pip', 'node', 'java', 'gcc'];

function isCommandPosition(line: string): boolean {
  const words = line.split(/\s+/).filter(Boolean);
  return words.length === 0 || (words.length === 1 && !/\s$/.test(line));
}

function completeCommand(text: string): string[] {
  const candidates = new Set([...BUILTIN_NAMES, ...COMMON_TOOLS]);
  return [...candidates].filter(name => name.startsWith(text)).sort().slice(0, MAX_COMPLETIONS);
}

function completePath(session: Session, text: string): string[] {
  const slash = text.lastIndexOf('/');
  const typedDirectory = text.slice(0, slash + 1);
  const prefix = text.slice(slash + 1);
  const directory = session.resolvePath(typedDirectory === '' ? '.' : typedDirectory);

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch {
    return [];
  }

  const matches: string[] = [];
  for (const entry of entries) {
    if (!entry.name.startsWith(prefix)) continue;

    let isDirectory = entry.isDirectory();
    if (entry.isSymbolicLink()) {
      try {
        isDirectory = fs.statSync(path.join(directory, entry.name)).isDirectory();
      } catch {
        isDirectory = false;
      }
    }
    matches.push(typedDirectory + entry.name + (isDirectory ? '/' : ''));
  }

  return matches.sort().slice(0, MAX_COMPLETIONS);
}

/**
 * Completion candidates for `text`, the word under the cursor, given the
 * whole `line` typed so far.
 *
 * In command position: builtin names and common tools. Elsewhere: paths
 * relative to the session's working directory, `~/`, or absolute, with a
 * trailing `/` on directories.
 *
 * @example
 * complete(session, 'mk', 'mk')          // ['mkdir']
 * complete(session, 'do', 'cd do')       // ['docs/']
 */
export function complete(session: Session, text: string, line: string): string[] {
  if (isCommandPosition(line)) {
    return completeCommand(text);
  }
  return completePath(session, text);
}

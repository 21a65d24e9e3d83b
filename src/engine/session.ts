/**
 * @fileoverview Session state for one terminal conversation.
 *
 * A Session owns the working directory, alias table, environment snapshot and
 * bounded command history. It is exclusively owned by one ShellEngine; hosts
 * serving several terminals keep one Session per session id (see SessionStore).
 *
 * @module engine/session
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * Options for creating a Session.
 *
 * @property workingDirectory - Starting directory (default: process.cwd())
 * @property environment - Initial environment (default: a copy of process.env)
 * @property aliases - Initial alias table
 * @property history - Previously recorded commands, oldest first
 * @property historyLimit - Maximum number of history entries kept
 */
export interface SessionOptions {
  workingDirectory?: string;
  environment?: Record<string, string>;
  aliases?: Record<string, string>;
  history?: string[];
  historyLimit?: number;
}

function snapshotProcessEnvironment(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

function isExistingDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

export class Session {
  readonly aliases: Map<string, string> = new Map();
  readonly environment: Record<string, string>;
  readonly historyLimit: number;
  private cwd: string;
  private entries: string[] = [];

  constructor(options: SessionOptions = {}) {
    this.environment = options.environment ? { ...options.environment } : snapshotProcessEnvironment();
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);

    const start = path.resolve(options.workingDirectory ?? process.cwd());
    if (!isExistingDirectory(start)) {
      throw new Error(`Working directory does not exist: ${start}`);
    }
    this.cwd = start;

    for (const [name, command] of Object.entries(options.aliases ?? {})) {
      this.aliases.set(name, command);
    }
    for (const line of options.history ?? []) {
      this.recordHistory(line);
    }
  }

  get workingDirectory(): string {
    return this.cwd;
  }

  get homeDirectory(): string {
    return this.environment.HOME || os.homedir();
  }

  /**
   * Move to another directory. The target must be an existing absolute
   * directory; callers check and report the failure cases themselves.
   */
  changeDirectory(target: string): void {
    if (!path.isAbsolute(target) || !isExistingDirectory(target)) {
      throw new Error(`Not an existing absolute directory: ${target}`);
    }
    this.environment.OLDPWD = this.cwd;
    this.cwd = target;
    this.environment.PWD = target;
  }

  /**
   * Resolve a user-supplied path against the working directory,
   * expanding a leading `~` to the home directory.
   */
  resolvePath(input: string): string {
    if (input === '~') {
      return this.homeDirectory;
    }
    if (input.startsWith('~/')) {
      return path.join(this.homeDirectory, input.slice(2));
    }
    return path.resolve(this.cwd, input);
  }

  /** Append a command line, evicting the oldest entries past the limit. */
  recordHistory(line: string): void {
    this.entries.push(line);
    if (this.entries.length > this.historyLimit) {
      this.entries.splice(0, this.entries.length - this.historyLimit);
    }
  }

  get history(): readonly string[] {
    return this.entries;
  }

  recentHistory(count: number): string[] {
    return count <= 0 ? [] : this.entries.slice(-count);
  }
}

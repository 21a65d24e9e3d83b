/**
 * @fileoverview Per-session engines for hosts serving several terminals.
 *
 * Each session id owns one ShellEngine (and with it one Session) and one
 * NaturalLanguageShell. Invocations for the same id run one at a time in
 * arrival order; different ids run independently.
 *
 * @module engine/store
 */

import { ShellEngine } from './shell';
import { Session, type SessionOptions } from './session';
import type { SystemInfoProvider } from './sysinfo';
import { ExternalExecutor } from './executor';
import type { CommandResult } from './types';
import { NaturalLanguageShell, type NaturalLanguageResult } from './ai/natural-shell';

/**
 * @property system - Shared OS information provider
 * @property commandTimeoutMs - Timeout for external commands in every session
 * @property sessionDefaults - Options applied to each new Session
 */
export interface SessionStoreOptions {
  system?: SystemInfoProvider;
  commandTimeoutMs?: number;
  sessionDefaults?: SessionOptions;
}

interface SessionEntry {
  engine: ShellEngine;
  natural: NaturalLanguageShell;
}

export class SessionStore {
  private entries: Map<string, SessionEntry> = new Map();
  /** Tail of each session's invocation chain */
  private locks: Map<string, Promise<void>> = new Map();
  private options: SessionStoreOptions;

  constructor(options: SessionStoreOptions = {}) {
    this.options = options;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * The engine for `id`, created on first use.
   */
  getOrCreate(id: string): ShellEngine {
    return this.entryFor(id).engine;
  }

  get(id: string): ShellEngine | undefined {
    return this.entries.get(id)?.engine;
  }

  delete(id: string): boolean {
    this.locks.delete(id);
    return this.entries.delete(id);
  }

  /**
   * Run a command line in the session `id`, after any invocation already
   * queued for that id.
   */
  execute(id: string, line: string): Promise<CommandResult> {
    const { engine } = this.entryFor(id);
    return this.withSessionLock(id, () => engine.execute(line));
  }

  /**
   * Interpret and run a natural-language phrase in the session `id`.
   */
  interpret(id: string, phrase: string): Promise<NaturalLanguageResult> {
    const { natural } = this.entryFor(id);
    return this.withSessionLock(id, () => natural.run(phrase));
  }

  private entryFor(id: string): SessionEntry {
    let entry = this.entries.get(id);
    if (!entry) {
      const engine = new ShellEngine({
        session: new Session(this.options.sessionDefaults),
        system: this.options.system,
        executor: new ExternalExecutor(this.options.commandTimeoutMs)
      });
      entry = { engine, natural: new NaturalLanguageShell(engine) };
      this.entries.set(id, entry);
    }
    return entry;
  }

  private async withSessionLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>(r => { release = r; });
    this.locks.set(id, current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(id) === current) {
        this.locks.delete(id);
      }
    }
  }
}

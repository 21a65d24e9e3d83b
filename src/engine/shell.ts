/**
 * @fileoverview Shell engine: runs one command line against a session.
 *
 * The ShellEngine is the single entry point for executing commands, managing:
 * - History recording
 * - Tokenizing, alias substitution and `&&` sequencing
 * - Wildcard expansion
 * - Dispatch to builtins or to the external executor
 *
 * Command failures are reported through the returned CommandResult.
 *
 * @module engine/shell
 */

import * as path from 'node:path';
import { tokenize, expandAliases, splitSequence, expandWildcards, toInvocation, ParseError } from './parser';
import type { CommandResult, ExecutionContext, Token } from './types';
import { Session } from './session';
import { HostSystemInfo, type SystemInfoProvider } from './sysinfo';
import { ExternalExecutor } from './executor';
import { BUILTIN_COMMANDS, isBuiltin } from './builtins';
import { EXIT_SENTINEL } from './builtins/exit';
import { errorMessage, toCommandResult } from './result';

/**
 * Configuration options for creating a ShellEngine instance.
 *
 * @property session - Session to run against (default: a new one in process.cwd())
 * @property system - OS information provider (default: HostSystemInfo)
 * @property executor - External command runner (default: 30 second timeout)
 * @property onHistoryAppend - Invoked with every line recorded in history (for persistence)
 */
export interface ShellEngineOptions {
  session?: Session;
  system?: SystemInfoProvider;
  executor?: ExternalExecutor;
  onHistoryAppend?: (line: string) => void;
}

/**
 * Command execution engine for one natterm session.
 *
 * @example
 * const shell = new ShellEngine({ session: new Session({ workingDirectory: '/tmp' }) });
 * const { output, exitCode } = await shell.execute('mkdir docs && cd docs');
 */
export class ShellEngine {
  readonly session: Session;
  private system: SystemInfoProvider;
  private executor: ExternalExecutor;
  private onHistoryAppend?: (line: string) => void;

  constructor(options: ShellEngineOptions = {}) {
    this.session = options.session ?? new Session();
    this.system = options.system ?? new HostSystemInfo();
    this.executor = options.executor ?? new ExternalExecutor();
    this.onHistoryAppend = options.onHistoryAppend;
  }

  /**
   * Execute a command line and report its combined output and exit code.
   */
  async execute(line: string): Promise<CommandResult> {
    const trimmed = line.trim();
    if (trimmed === '') {
      return { output: '', exitCode: 0 };
    }

    this.session.recordHistory(trimmed);
    this.onHistoryAppend?.(trimmed);

    let segments: Token[][];
    try {
      segments = splitSequence(expandAliases(tokenize(trimmed), this.session.aliases));
    } catch (error) {
      if (error instanceof ParseError) {
        return { output: `Command parsing error: ${error.message}`, exitCode: 1 };
      }
      throw error;
    }

    const outputs: string[] = [];
    let exitCode = 0;

    for (const segment of segments) {
      const words = await expandWildcards(segment, input => this.session.resolvePath(input));
      const { name, args } = toInvocation(words);
      const result = await this.executeCommand(name, args);
      if (result.output !== '') {
        outputs.push(result.output);
      }
      exitCode = result.exitCode;
      if (exitCode !== 0 || result.output === EXIT_SENTINEL) {
        break;
      }
    }

    return { output: outputs.join('\n'), exitCode };
  }

  private async executeCommand(name: string, args: string[]): Promise<CommandResult> {
    if (isBuiltin(name)) {
      const context: ExecutionContext = { session: this.session, system: this.system };
      try {
        return toCommandResult(await BUILTIN_COMMANDS[name](args, context));
      } catch (error) {
        return { output: `Error executing ${name}: ${errorMessage(error)}`, exitCode: 1 };
      }
    }

    return this.executor.run(name, args, {
      cwd: this.session.workingDirectory,
      env: this.session.environment
    });
  }

  /**
   * Prompt text for interactive front ends: `user@host:dir$ `.
   */
  getPrompt(): string {
    const env = this.session.environment;
    const user = env.USER || env.USERNAME || 'user';
    const host = env.HOSTNAME || env.COMPUTERNAME || 'localhost';
    const cwd = this.session.workingDirectory;
    const dir = path.basename(cwd) || '/';
    return `${user}@${host}:${dir}$ `;
  }
}

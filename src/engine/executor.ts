/**
 * @fileoverview External command execution.
 *
 * Commands that are not builtins run as child processes in the session's
 * working directory with the session's environment. Standard output and
 * standard error are captured and concatenated (stdout first). A wall-clock
 * timeout kills the child.
 *
 * Failure mapping:
 * - executable not found   → "Command not found: <name>", exit 127
 * - timeout exceeded       → "Command timed out after <n> seconds", exit 1
 * - any other launch fault → "Error executing external command: <detail>", exit 1
 *
 * @module engine/executor
 */

import { spawn, type ChildProcess } from 'node:child_process';
import type { CommandResult } from './types';
import { errnoCode, errorMessage } from './result';

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

/**
 * @property cwd - Directory the child starts in
 * @property env - Complete environment for the child
 */
export interface ExternalRunOptions {
  cwd: string;
  env: Record<string, string>;
}

function launchFailure(name: string, error: unknown): CommandResult {
  if (errnoCode(error) === 'ENOENT') {
    return { output: `Command not found: ${name}`, exitCode: 127 };
  }
  return { output: `Error executing external command: ${errorMessage(error)}`, exitCode: 1 };
}

export class ExternalExecutor {
  readonly timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  /**
   * Run `name` with `args` and wait for it to exit or time out.
   *
   * @example
   * const result = await executor.run('git', ['status'], { cwd: '/repo', env });
   */
  run(name: string, args: string[], options: ExternalRunOptions): Promise<CommandResult> {
    return new Promise<CommandResult>(resolve => {
      let child: ChildProcess;
      try {
        child = spawn(name, args, {
          cwd: options.cwd,
          env: options.env,
          stdio: ['ignore', 'pipe', 'pipe']
        });
      } catch (error) {
        resolve(launchFailure(name, error));
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const finish = (result: CommandResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        finish({ output: `Command timed out after ${this.timeoutMs / 1000} seconds`, exitCode: 1 });
      }, this.timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', error => finish(launchFailure(name, error)));

      child.on('close', code => {
        finish({
          output: Buffer.concat(stdout).toString('utf8') + Buffer.concat(stderr).toString('utf8'),
          // Killed by a signal: no exit code to report
          exitCode: code ?? 1
        });
      });
    });
  }
}

/**
 * @fileoverview Builtin outcome helpers and the single mapping from error kinds to exit codes.
 *
 * @module engine/result
 */

import type { BuiltinOutcome, CommandResult, ErrorKind } from './types';

export const succeed = (output: string): BuiltinOutcome => ({ ok: true, output });

export const fail = (kind: ErrorKind, message: string): BuiltinOutcome => ({
  ok: false,
  error: { kind, message }
});

/**
 * Exit code for a builtin failure. Usage errors get 2, like most Unix tools;
 * everything else is a plain failure.
 */
export function exitCodeFor(kind: ErrorKind): number {
  switch (kind) {
    case 'usage':
      return 2;
    case 'not_found':
    case 'permission_denied':
    case 'invalid_argument':
    case 'conflict':
    case 'io':
      return 1;
    default: {
      const unreachable: never = kind;
      throw new Error(`Unknown error kind: ${String(unreachable)}`);
    }
  }
}

export function toCommandResult(outcome: BuiltinOutcome): CommandResult {
  if (outcome.ok) {
    return { output: outcome.output, exitCode: 0 };
  }
  return { output: outcome.error.message, exitCode: exitCodeFor(outcome.error.kind) };
}

/**
 * Read the errno code off a thrown value, if it has one.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function errorKindFor(error: unknown): ErrorKind {
  switch (errnoCode(error)) {
    case 'ENOENT':
      return 'not_found';
    case 'EACCES':
    case 'EPERM':
      return 'permission_denied';
    case 'EISDIR':
    case 'ENOTDIR':
    case 'ENOTEMPTY':
    case 'EEXIST':
      return 'conflict';
    default:
      return 'io';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Accumulates one line per operand for commands like mkdir, rm and touch.
 * The outcome fails with the kind of the first failing operand, but keeps
 * every line so the successful operands are still reported.
 */
export class OutcomeReport {
  private lines: string[] = [];
  private firstFailure: ErrorKind | null = null;

  add(line: string): void {
    this.lines.push(line);
  }

  addFailure(kind: ErrorKind, line: string): void {
    this.lines.push(line);
    this.firstFailure ??= kind;
  }

  toOutcome(): BuiltinOutcome {
    const text = this.lines.join('\n');
    return this.firstFailure === null ? succeed(text) : fail(this.firstFailure, text);
  }
}

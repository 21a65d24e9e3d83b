/**
 * @fileoverview Core type definitions for the natterm shell engine.
 *
 * This module defines the fundamental types used throughout the shell:
 * - Token types for the lexer
 * - Command invocations produced from a command line
 * - Command results and builtin outcomes
 * - The execution context handed to builtins
 *
 * @module engine/types
 */

import type { Session } from './session';
import type { SystemInfoProvider } from './sysinfo';

/**
 * Token produced by the shell lexer.
 *
 * @property type - 'word' for arguments, 'and' for an unquoted `&&`
 * @property value - The token text with quotes and escapes removed
 * @property quoted - True when any part of the word was quoted or escaped;
 *   quoted words are never wildcard-expanded
 *
 * @example
 * // echo "hello world"
 * [{ type: 'word', value: 'echo', quoted: false },
 *  { type: 'word', value: 'hello world', quoted: true }]
 */
export type Token = {
  type: 'word' | 'and';
  value: string;
  quoted: boolean;
};

/**
 * A single command after tokenization and alias substitution.
 *
 * @example
 * // ls -l /tmp
 * { name: 'ls', args: ['-l', '/tmp'] }
 */
export interface CommandInvocation {
  name: string;
  args: string[];
}

/**
 * Result returned from executing a command line.
 *
 * @property output - Text produced by the command, possibly multi-line or empty
 * @property exitCode - 0 for success, non-zero for a failure kind
 */
export interface CommandResult {
  output: string;
  exitCode: number;
}

/**
 * Failure kinds a builtin can report.
 *
 * - usage: missing or malformed arguments
 * - not_found: path, process or alias absent
 * - permission_denied: the OS refused access
 * - invalid_argument: an argument had the wrong shape (e.g. a non-numeric PID)
 * - conflict: the target exists but is the wrong kind (directory without -r, non-empty directory)
 * - io: any other filesystem or system failure
 */
export type ErrorKind =
  | 'usage'
  | 'not_found'
  | 'permission_denied'
  | 'invalid_argument'
  | 'conflict'
  | 'io';

export interface BuiltinError {
  kind: ErrorKind;
  message: string;
}

/**
 * What a builtin hands back to the engine. The engine turns this into a
 * CommandResult in one place, so builtins never pick exit codes themselves.
 */
export type BuiltinOutcome =
  | { ok: true; output: string }
  | { ok: false; error: BuiltinError };

/**
 * Execution context passed to builtins.
 *
 * @property session - The mutable session the command runs against
 * @property system - OS information collaborator for ps/top/df/free/kill
 */
export interface ExecutionContext {
  session: Session;
  system: SystemInfoProvider;
}

/**
 * Function signature for builtin shell commands.
 *
 * @example
 * const echo: BuiltinCommand = async (args) => succeed(args.join(' '));
 */
export type BuiltinCommand = (args: string[], context: ExecutionContext) => Promise<BuiltinOutcome>;

import type { BuiltinCommand } from "../types";
import { succeed } from "../result";

/**
 * Output value that tells the attached front end to end the session.
 */
export const EXIT_SENTINEL = "EXIT_TERMINAL";

/**
 * Exit/quit builtin command.
 *
 * Usage:
 *   exit  - End the terminal session
 *   quit  - Alias for exit
 *
 * The engine itself keeps running; the CLI loop or a hosting server sees the
 * sentinel output and tears the session down.
 */
export const exit: BuiltinCommand = async () => succeed(EXIT_SENTINEL);

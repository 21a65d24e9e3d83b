import type { BuiltinCommand } from '../types';
import { ls, cd, pwd, cat, echo, mkdir, rmdir, touch, rm, cp, mv, find, grep, tree } from './filesystem';
import { ps, top, df, free, kill, history, clear, date } from './system';
import { whoami, env, set } from './environment';
import { alias, unalias } from './alias';
import { help } from './help';
import { exit } from './exit';

export { ls, cd, pwd, cat, echo, mkdir, rmdir, touch, rm, cp, mv, find, grep, tree, ps, top, df, free, kill, history, clear, date, whoami, env, set, alias, unalias, help, exit };

/**
 * The closed set of builtin commands. Windows-style spellings share the
 * handler of their Unix counterpart.
 */
export const BUILTIN_COMMANDS = {
  cd,
  pwd,
  ls,
  dir: ls,
  mkdir,
  rmdir,
  rm,
  del: rm,
  touch,
  cat,
  type: cat,
  echo,
  cp,
  copy: cp,
  mv,
  move: mv,
  find,
  grep,
  tree,
  ps,
  kill,
  top,
  df,
  free,
  whoami,
  date,
  history,
  clear,
  cls: clear,
  env,
  set,
  alias,
  unalias,
  help,
  exit,
  quit: exit,
} as const satisfies Record<string, BuiltinCommand>;

export type BuiltinName = keyof typeof BUILTIN_COMMANDS;

export const BUILTIN_NAMES: readonly string[] = Object.keys(BUILTIN_COMMANDS);

export function isBuiltin(name: string): name is BuiltinName {
  return Object.prototype.hasOwnProperty.call(BUILTIN_COMMANDS, name);
}

import type { BuiltinCommand } from '../types';
import { OutcomeReport, fail, succeed } from '../result';

/**
 * Reject empty names, names starting with digits, or names containing
 * whitespace or characters the command line treats specially.
 */
function isValidAliasName(name: string): boolean {
  return name.length > 0 && !/^[0-9]/.test(name) && !/[=\s&'"\\]/.test(name);
}

/**
 * alias - Define or display aliases
 * Usage: alias                    Lists all aliases
 *        alias name=command       Defines alias 'name' as 'command'
 *        alias name='ls -l'       Quote values that contain spaces
 *
 * Only the first word of a command line is looked up, once.
 */
export const alias: BuiltinCommand = async (args, { session }) => {
  const aliases = session.aliases;

  if (args.length === 0) {
    if (aliases.size === 0) {
      return succeed('No aliases defined');
    }
    const lines = Array.from(aliases.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, command]) => `  ${name} = ${command}`);
    return succeed(['Defined aliases:', ...lines].join('\n'));
  }

  if (args.some(arg => !arg.includes('='))) {
    return fail('usage', 'Usage: alias name=command');
  }

  const report = new OutcomeReport();
  for (const arg of args) {
    const equalIndex = arg.indexOf('=');
    const name = arg.slice(0, equalIndex).trim();
    const command = arg.slice(equalIndex + 1).trim();

    if (!isValidAliasName(name)) {
      report.addFailure('invalid_argument', `alias: '${name}': invalid alias name`);
      continue;
    }

    aliases.set(name, command);
    report.add(`Alias created: ${name} = ${command}`);
  }
  return report.toOutcome();
};

/**
 * unalias - Remove alias definitions
 * Usage: unalias name [name2 ...]    Removes the specified aliases
 *        unalias -a                   Removes all aliases
 */
export const unalias: BuiltinCommand = async (args, { session }) => {
  if (args.length === 0) {
    return fail('usage', 'Usage: unalias [-a] name [name ...]');
  }

  if (args.includes('-a')) {
    session.aliases.clear();
    return succeed('All aliases removed');
  }

  const report = new OutcomeReport();
  for (const name of args) {
    if (session.aliases.delete(name)) {
      report.add(`Alias removed: ${name}`);
    } else {
      report.addFailure('not_found', `Alias not found: ${name}`);
    }
  }
  return report.toOutcome();
};

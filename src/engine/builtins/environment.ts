import type { BuiltinCommand } from '../types';
import { fail, succeed } from '../result';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * whoami - Print the current username
 * Reads USER, then USERNAME, from the session environment.
 */
export const whoami: BuiltinCommand = async (_args, { session }) => {
  return succeed(session.environment.USER || session.environment.USERNAME || 'unknown');
};

/**
 * env - Display all environment variables
 * Lists KEY=value lines sorted by key.
 */
export const env: BuiltinCommand = async (_args, { session }) => {
  const output = Object.entries(session.environment)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${value}`)
    .join('\n');

  return succeed(output);
};

/**
 * set - Set an environment variable
 * Usage: set KEY=value
 * External commands started afterwards see the new value.
 */
export const set: BuiltinCommand = async (args, { session }) => {
  if (args.length === 0 || !args[0].includes('=')) {
    return fail('usage', 'Usage: set VARIABLE=value');
  }

  const equalIndex = args[0].indexOf('=');
  const key = args[0].slice(0, equalIndex);
  const value = args[0].slice(equalIndex + 1);

  if (!IDENTIFIER.test(key)) {
    return fail('invalid_argument', `set: '${key}': not a valid identifier`);
  }

  session.environment[key] = value;
  return succeed(`Set ${key}=${value}`);
};

/**
 * @fileoverview Shell command parser: lexer, alias substitution, `&&` sequencing
 * and single-segment wildcard expansion.
 *
 * The parser supports:
 * - Words separated by whitespace
 * - Single quotes (literal) and double quotes (with `\"` and `\\` escapes)
 * - Backslash escapes outside quotes
 * - `&&` to run the next command only when the previous one succeeded
 *
 * Pipes, redirection, subshells and variable expansion are not part of the grammar.
 *
 * @module engine/parser
 */

import * as fs from 'node:fs';
import { minimatch } from 'minimatch';
import type { Token, CommandInvocation } from './types';

/**
 * Raised when a command line cannot be tokenized or sequenced.
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', '\\', '$', '`']);

function isSpace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

/**
 * Tokenize a command line with shell-style quoting.
 *
 * Adjacent quoted and unquoted parts join into a single word, so
 * `name="a b"` yields the one word `name=a b`.
 *
 * @throws ParseError if a quote is not closed or the line ends in a backslash
 *
 * @example
 * tokenize('cp "my file.txt" backup && ls')
 * // [word cp] [word my file.txt] [word backup] [and] [word ls]
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let current = 0;

  while (current < input.length) {
    if (isSpace(input[current])) {
      current++;
      continue;
    }

    if (input.startsWith('&&', current)) {
      tokens.push({ type: 'and', value: '&&', quoted: false });
      current += 2;
      continue;
    }

    let value = '';
    let quoted = false;

    while (current < input.length && !isSpace(input[current]) && !input.startsWith('&&', current)) {
      const char = input[current];

      if (char === "'") {
        const close = input.indexOf("'", current + 1);
        if (close === -1) {
          throw new ParseError('No closing quotation');
        }
        value += input.slice(current + 1, close);
        quoted = true;
        current = close + 1;
        continue;
      }

      if (char === '"') {
        quoted = true;
        current++;
        let closed = false;
        while (current < input.length) {
          const inner = input[current];
          if (inner === '"') {
            closed = true;
            current++;
            break;
          }
          if (inner === '\\' && current + 1 < input.length && DOUBLE_QUOTE_ESCAPABLE.has(input[current + 1])) {
            value += input[current + 1];
            current += 2;
            continue;
          }
          value += inner;
          current++;
        }
        if (!closed) {
          throw new ParseError('No closing quotation');
        }
        continue;
      }

      if (char === '\\') {
        if (current + 1 >= input.length) {
          throw new ParseError('No escaped character');
        }
        value += input[current + 1];
        quoted = true;
        current += 2;
        continue;
      }

      value += char;
      current++;
    }

    tokens.push({ type: 'word', value, quoted });
  }

  return tokens;
}

/**
 * Substitute aliases in command position (the first word of the line and the
 * first word after each `&&`).
 *
 * Substitution is a single pass: the alias value is tokenized and spliced in,
 * and the spliced words are never looked up again. `alias ls='ls -a'` therefore
 * expands once and cannot loop. Quoted words are never treated as aliases.
 *
 * @example
 * expandAliases(tokenize('ll /tmp'), new Map([['ll', 'ls -l']]))
 * // tokens for: ls -l /tmp
 */
export function expandAliases(tokens: Token[], aliases: ReadonlyMap<string, string>): Token[] {
  if (tokens.length === 0 || aliases.size === 0) {
    return tokens;
  }

  const result: Token[] = [];
  let isCommandPosition = true;

  for (const token of tokens) {
    if (token.type === 'and') {
      result.push(token);
      isCommandPosition = true;
      continue;
    }

    const replacement = isCommandPosition && !token.quoted ? aliases.get(token.value) : undefined;
    if (replacement !== undefined) {
      result.push(...tokenize(replacement));
    } else {
      result.push(token);
    }
    isCommandPosition = false;
  }

  return result;
}

/**
 * Split a token stream on `&&` into the commands to run in order.
 *
 * @throws ParseError when either side of an `&&` is empty
 */
export function splitSequence(tokens: Token[]): Token[][] {
  const segments: Token[][] = [[]];

  for (const token of tokens) {
    if (token.type === 'and') {
      segments.push([]);
    } else {
      segments[segments.length - 1].push(token);
    }
  }

  if (segments.length > 1 && segments.some(segment => segment.length === 0)) {
    throw new ParseError("syntax error near '&&'");
  }

  return segments.filter(segment => segment.length > 0);
}

const WILDCARD = /[*?]/;

/**
 * Expand unquoted words carrying `*` or `?` in their last path segment into
 * the sorted matching directory entries. A word that matches nothing, or
 * whose directory part itself holds a wildcard, is left as typed.
 *
 * @param resolve - Turns the directory part of a word into an absolute path
 */
export async function expandWildcards(tokens: Token[], resolve: (input: string) => string): Promise<Token[]> {
  const result: Token[] = [];

  for (const token of tokens) {
    if (token.type !== 'word' || token.quoted || !WILDCARD.test(token.value) || token.value.endsWith('/')) {
      result.push(token);
      continue;
    }

    const slash = token.value.lastIndexOf('/');
    const prefix = token.value.slice(0, slash + 1);
    const pattern = token.value.slice(slash + 1);
    if (WILDCARD.test(prefix)) {
      result.push(token);
      continue;
    }

    let entries: string[];
    try {
      entries = await fs.promises.readdir(resolve(prefix === '' ? '.' : prefix));
    } catch {
      result.push(token);
      continue;
    }

    const matches = entries.filter(name => minimatch(name, pattern)).sort();
    if (matches.length === 0) {
      result.push(token);
      continue;
    }
    for (const name of matches) {
      result.push({ type: 'word', value: prefix + name, quoted: true });
    }
  }

  return result;
}

/**
 * Turn the words of one sequence segment into a command invocation.
 */
export function toInvocation(tokens: Token[]): CommandInvocation {
  const [first, ...rest] = tokens.map(token => token.value);
  return { name: first ?? '', args: rest };
}

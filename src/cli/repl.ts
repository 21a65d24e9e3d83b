/**
 * @fileoverview Line-oriented terminal front end for CLI mode.
 *
 * Reads command lines with node:readline (history, tab completion), runs
 * them through the shell engine, optionally interpreting natural language
 * first, and prints the output.
 *
 * Front-end commands, handled before the engine sees the line:
 * - `toggle ai`  switch natural-language interpretation on or off
 * - `ai help`    show natural-language examples
 *
 * @module cli/repl
 */

import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { ShellEngine } from '../engine/shell';
import { complete } from '../engine/completion';
import { EXIT_SENTINEL } from '../engine/builtins/exit';
import { NaturalLanguageShell, NATURAL_LANGUAGE_HELP, suggest } from '../engine/ai';
import type { HistoryFile } from '../persistence/history';

export type ReplMode = 'cli' | 'ai';

/**
 * @property mode - 'ai' starts with natural-language interpretation on
 * @property engine - Engine the lines run against
 * @property history - History file rewritten with the session history on exit
 * @property write - Output sink (default: process.stdout)
 */
export interface ReplOptions {
  mode: ReplMode;
  engine: ShellEngine;
  history?: HistoryFile;
  write?: (text: string) => void;
}

/**
 * Separate a trailing exit sentinel from the text printed before it.
 */
export function splitExit(output: string): { text: string; exit: boolean } {
  if (output === EXIT_SENTINEL) {
    return { text: '', exit: true };
  }
  if (output.endsWith('\n' + EXIT_SENTINEL)) {
    return { text: output.slice(0, -(EXIT_SENTINEL.length + 1)), exit: true };
  }
  return { text: output, exit: false };
}

export class Repl {
  readonly natural: NaturalLanguageShell;
  private engine: ShellEngine;
  private history?: HistoryFile;
  private write: (text: string) => void;

  constructor(options: ReplOptions) {
    this.engine = options.engine;
    this.history = options.history;
    this.write = options.write ?? (text => process.stdout.write(text));
    this.natural = new NaturalLanguageShell(options.engine);
    if (options.mode === 'cli') {
      this.natural.toggle();
    }
  }

  get prompt(): string {
    const prompt = this.engine.getPrompt();
    return this.natural.interpretationEnabled ? `AI ${prompt}` : prompt;
  }

  banner(): string {
    const lines = this.natural.interpretationEnabled
      ? [
          'natterm - natural-language terminal',
          'Type natural language or regular commands',
          "Type 'ai help' for examples, 'toggle ai' to switch modes, 'exit' to quit"
        ]
      : [
          "natterm - Type 'help' for available commands",
          "Use Ctrl+C to interrupt, 'exit' or 'quit' to exit"
        ];
    return lines.join('\n') + '\n\n';
  }

  /**
   * Readline completer. With interpretation on, a multi-word line is offered
   * matching phrase starters first; otherwise the word at the end of `line`
   * is completed.
   */
  completer = (line: string): [string[], string] => {
    const phrase = line.trim();
    if (this.natural.interpretationEnabled && /\s/.test(phrase)) {
      const phrases = suggest(phrase);
      if (phrases.length > 0) {
        return [phrases, line];
      }
    }
    const text = /\S*$/.exec(line)?.[0] ?? '';
    return [complete(this.engine.session, text, line), text];
  };

  /**
   * Handle one input line. Resolves to false when the session should end.
   */
  async handleLine(input: string): Promise<boolean> {
    const line = input.trim();
    if (line === '') {
      return true;
    }

    const lowered = line.toLowerCase();
    if (lowered === 'toggle ai') {
      const enabled = this.natural.toggle();
      this.write(`AI interpretation ${enabled ? 'enabled' : 'disabled'}\n`);
      return true;
    }
    if (lowered === 'ai help') {
      this.write(NATURAL_LANGUAGE_HELP + '\n');
      return true;
    }

    let output: string;
    if (this.natural.interpretationEnabled) {
      const result = await this.natural.run(line);
      if (result.outcome.stage !== 'passthrough') {
        this.write(`✓ ${result.outcome.explanation}\n`);
      }
      output = result.output;
    } else {
      ({ output } = await this.engine.execute(line));
    }

    const { text, exit } = splitExit(output);
    if (text !== '') {
      this.write(text + '\n');
    }
    return !exit;
  }

  /**
   * Run the read-eval-print loop until exit or end of input.
   */
  async run(input: Readable = process.stdin, output: Writable = process.stdout): Promise<void> {
    const rl = readline.createInterface({
      input,
      output,
      completer: this.completer,
      history: [...this.engine.session.history].reverse(),
      historySize: this.engine.session.historyLimit
    });

    rl.on('SIGINT', () => {
      this.write('^C\n');
      rl.setPrompt(this.prompt);
      rl.prompt();
    });

    let ended = true;
    try {
      rl.setPrompt(this.prompt);
      rl.prompt();
      for await (const line of rl) {
        if (!(await this.handleLine(line))) {
          ended = false;
          break;
        }
        rl.setPrompt(this.prompt);
        rl.prompt();
      }
    } finally {
      rl.close();
    }

    if (ended) {
      this.write('\nGoodbye!\n');
    }

    if (this.history) {
      try {
        await this.history.save(this.engine.session.history, this.engine.session.historyLimit);
      } catch (error) {
        console.warn(`Failed to write ${this.history.filePath}:`, error);
      }
    }
  }
}

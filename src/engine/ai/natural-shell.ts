/**
 * Natural-language front for a ShellEngine.
 *
 * Each phrase is interpreted and the resulting command line is executed in
 * the engine's session. Interpretation can be switched off, in which case
 * phrases run exactly as typed.
 */

import type { ShellEngine } from '../shell';
import type { CommandResult } from '../types';
import { interpret, PASSTHROUGH_EXPLANATION, type TranslationOutcome } from './translator';
import type { RuleTable } from './rules';

export interface NaturalLanguageResult extends CommandResult {
  outcome: TranslationOutcome;
}

export const NATURAL_LANGUAGE_HELP = `natterm - Natural Language Commands

You can use natural language to interact with the terminal. Here are some examples:

File Operations:
  "create a file named test.txt"
  "make a new folder called documents"
  "delete the file oldfile.txt"
  "copy file1.txt to backup"
  "move document.pdf to archive"
  "show me the contents of readme.txt"

Navigation:
  "list all files"
  "go to the documents folder"
  "where am I"

System Information:
  "show me system info"
  "list running processes"
  "check disk usage"
  "show memory usage"

Complex Operations:
  "create a folder called test and move file1.txt into it"
  "copy all .py files to backup"
  "delete all files in tmp"
  "find and delete files named temp.log"

Regular commands work too; anything that is not recognised runs as typed.
Type 'toggle ai' to switch interpretation on or off.`;

export class NaturalLanguageShell {
  private enabled = true;

  constructor(
    readonly engine: ShellEngine,
    private readonly rules?: RuleTable
  ) {}

  get interpretationEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Flip interpretation on or off and report the new state.
   */
  toggle(): boolean {
    this.enabled = !this.enabled;
    return this.enabled;
  }

  /**
   * Interpret a phrase (when enabled) and execute the result.
   */
  async run(phrase: string): Promise<NaturalLanguageResult> {
    const outcome: TranslationOutcome = this.enabled
      ? interpret(phrase, this.rules)
      : { commandLine: phrase, explanation: PASSTHROUGH_EXPLANATION, stage: 'passthrough' };

    const result = await this.engine.execute(outcome.commandLine);
    return { ...result, outcome };
  }
}

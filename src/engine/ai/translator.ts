/**
 * Natural-Language Translator
 *
 * Turns a plain-English request into a command line for the shell engine.
 *
 * Stages, first hit wins:
 * - multi-step: composite requests that expand to `a && b` or a wildcard
 * - pattern: per-category regular expressions, in table order
 * - keyword: loose keyword heuristics
 * - passthrough: the phrase is run exactly as typed
 *
 * The translator is pure: it never touches the filesystem or the session.
 */

import { loadRuleTable, type RuleTable } from './rules';

export type TranslationStage = 'multi-step' | 'pattern' | 'keyword' | 'passthrough';

/**
 * Result of interpreting a phrase
 */
export interface TranslationOutcome {
  /** Command line to execute */
  commandLine: string;
  /** Human-readable note on how the phrase was read */
  explanation: string;
  /** Which stage produced the command line */
  stage: TranslationStage;
  /** Matching rule name (multi-step) or category (pattern) */
  category?: string;
}

export const PASSTHROUGH_EXPLANATION = 'No interpretation found, executing as-is';
export const MULTI_STEP_EXPLANATION = 'Interpreted as a multi-step command';
export const KEYWORD_EXPLANATION = 'Interpreted using keywords';

/**
 * Substitute `{0}`, `{1}`, ... with capture groups. A group that did not
 * participate in the match becomes the empty string.
 *
 * @example
 * fillTemplate('mkdir {0} && mv {1} {0}/', ['docs', 'a.txt'])
 * // 'mkdir docs && mv a.txt docs/'
 */
export function fillTemplate(template: string, groups: ReadonlyArray<string | undefined>): string {
  return template.replace(/\{(\d+)\}/g, (_placeholder, index: string) => groups[Number(index)] ?? '');
}

const CREATE_WORDS = ['create', 'make', 'new'];
const DIRECTORY_WORDS = ['folder', 'directory', 'dir'];
const NAVIGATE_WORDS = ['go', 'navigate', 'change'];
const DELETE_WORDS = ['delete', 'remove', 'rm'];
const DELETE_FILLER = [...DELETE_WORDS, 'file', 'the'];

const hasAny = (words: string[], candidates: string[]): boolean =>
  candidates.some(candidate => words.includes(candidate));

/**
 * Keyword heuristics for phrases no pattern matched.
 * Returns null when no heuristic applies.
 */
export function interpretByKeywords(normalized: string): string | null {
  const words = normalized.split(/\s+/).filter(Boolean);

  if (hasAny(words, CREATE_WORDS) && words.includes('file')) {
    const index = words.indexOf('file');
    return index + 1 < words.length ? `touch ${words[index + 1]}` : 'touch newfile.txt';
  }

  if (hasAny(words, CREATE_WORDS) && hasAny(words, DIRECTORY_WORDS)) {
    const index = words.findIndex(word => DIRECTORY_WORDS.includes(word));
    return index + 1 < words.length ? `mkdir ${words[index + 1]}` : 'mkdir newfolder';
  }

  if (hasAny(words, NAVIGATE_WORDS) && hasAny(words, ['directory', 'folder', 'to'])) {
    const index = words.indexOf('to');
    if (index !== -1 && index + 1 < words.length) {
      return `cd ${words[index + 1]}`;
    }
  }

  if (hasAny(words, ['list', 'show']) && hasAny(words, ['files', 'contents'])) {
    return 'ls';
  }

  if (hasAny(words, DELETE_WORDS)) {
    const target = words.find(word => !DELETE_FILLER.includes(word));
    if (target !== undefined) {
      return `rm ${target}`;
    }
  }

  return null;
}

/**
 * Interpret a natural-language phrase.
 *
 * @example
 * interpret('create a file named test.txt')
 * // { commandLine: 'touch test.txt', stage: 'pattern', category: 'create_file', ... }
 */
export function interpret(phrase: string, rules: RuleTable = loadRuleTable()): TranslationOutcome {
  const normalized = phrase.trim().toLowerCase();

  if (normalized !== '') {
    for (const rule of rules.multiStep) {
      const match = rule.pattern.exec(normalized);
      if (match) {
        return {
          commandLine: fillTemplate(rule.template, match.slice(1)),
          explanation: MULTI_STEP_EXPLANATION,
          stage: 'multi-step',
          category: rule.name
        };
      }
    }

    for (const rule of rules.categories) {
      for (const pattern of rule.patterns) {
        const match = pattern.exec(normalized);
        if (match) {
          const commandLine = fillTemplate(rule.template, match.slice(1));
          return {
            commandLine,
            explanation: `Interpreted '${phrase}' as '${commandLine}'`,
            stage: 'pattern',
            category: rule.category
          };
        }
      }
    }

    const keywordCommand = interpretByKeywords(normalized);
    if (keywordCommand !== null) {
      return { commandLine: keywordCommand, explanation: KEYWORD_EXPLANATION, stage: 'keyword' };
    }
  }

  return { commandLine: phrase, explanation: PASSTHROUGH_EXPLANATION, stage: 'passthrough' };
}

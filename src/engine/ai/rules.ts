/**
 * Translation rule table
 *
 * Loads rules.yaml (next to this module) and compiles it into ordered
 * regular-expression rules. The table is read once per process.
 */

import * as fs from 'node:fs';
import yaml from 'js-yaml';

export interface MultiStepRule {
  name: string;
  pattern: RegExp;
  template: string;
}

export interface CategoryRule {
  category: string;
  patterns: RegExp[];
  template: string;
}

export interface RuleTable {
  multiStep: MultiStepRule[];
  categories: CategoryRule[];
}

interface RawMultiStep {
  name: string;
  pattern: string;
  template: string;
}

interface RawCategory {
  category: string;
  patterns: string[];
  template: string;
}

interface RawRuleTable {
  multiStep: RawMultiStep[];
  categories: RawCategory[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRawMultiStep(value: unknown): value is RawMultiStep {
  return isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.pattern === 'string' &&
    typeof value.template === 'string';
}

function isRawCategory(value: unknown): value is RawCategory {
  return isRecord(value) &&
    typeof value.category === 'string' &&
    Array.isArray(value.patterns) &&
    value.patterns.every(pattern => typeof pattern === 'string') &&
    typeof value.template === 'string';
}

function isRawRuleTable(value: unknown): value is RawRuleTable {
  return isRecord(value) &&
    Array.isArray(value.multiStep) &&
    value.multiStep.every(isRawMultiStep) &&
    Array.isArray(value.categories) &&
    value.categories.every(isRawCategory);
}

/**
 * Parse and compile a rule table from YAML text.
 *
 * @throws Error when the YAML is malformed, the shape is wrong, or a pattern
 *   is not a valid regular expression
 */
export function parseRuleTable(content: string): RuleTable {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (e) {
    throw new Error(`Invalid rule table YAML: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (!isRawRuleTable(parsed)) {
    throw new Error('Invalid rule table format');
  }

  return {
    multiStep: parsed.multiStep.map(rule => ({
      name: rule.name,
      pattern: new RegExp(rule.pattern, 'i'),
      template: rule.template
    })),
    categories: parsed.categories.map(rule => ({
      category: rule.category,
      patterns: rule.patterns.map(pattern => new RegExp(pattern, 'i')),
      template: rule.template
    }))
  };
}

let cachedTable: RuleTable | null = null;

/**
 * The bundled rule table.
 */
export function loadRuleTable(): RuleTable {
  if (!cachedTable) {
    const content = fs.readFileSync(new URL('./rules.yaml', import.meta.url), 'utf8');
    cachedTable = parseRuleTable(content);
  }
  return cachedTable;
}

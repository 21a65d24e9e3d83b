// Natural-language module exports
export {
  interpret,
  interpretByKeywords,
  fillTemplate,
  PASSTHROUGH_EXPLANATION,
  MULTI_STEP_EXPLANATION,
  KEYWORD_EXPLANATION,
  type TranslationOutcome,
  type TranslationStage
} from './translator';

export {
  loadRuleTable,
  parseRuleTable,
  type RuleTable,
  type MultiStepRule,
  type CategoryRule
} from './rules';

export { suggest, PHRASE_STARTERS, MAX_SUGGESTIONS } from './suggestions';

export {
  NaturalLanguageShell,
  NATURAL_LANGUAGE_HELP,
  type NaturalLanguageResult
} from './natural-shell';

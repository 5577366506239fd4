export { FilterRule, compileFilterRule, escapeRegExp } from './engine/services/filter-rule';
export type { FilterRuleResult } from './engine/services/filter-rule';
export { InvalidPatternError } from './engine/services/invalid-pattern';
export { parseReplacementTemplate, expandTemplate } from './engine/services/replacement-template';
export type { ReplacementTemplate, TemplatePart } from './engine/services/replacement-template';
export { RuleSet } from './engine/services/rule-set';
export { applyRules, applyRulesUntilStable } from './engine/services/apply-rules';
export type { RuleSource } from './engine/services/apply-rules';
export { parseRuleTable, compileRuleDefinitions, loadRuleTable } from './engine/services/rule-table';
export type { RuleTableParseResult, RuleTableLoadResult } from './engine/services/rule-table';
export {
  PredefinedTable,
  getPredefinedRuleSet,
  describePredefinedTable,
  youtubeTrackFilterRules,
  trimSymbolsFilterRules,
  remasteredFilterRules,
  liveFilterRules,
  cleanExplicitFilterRules,
  featureFilterRules,
  normalizeFeatureFilterRules,
  versionFilterRules,
  suffixFilterRules,
  trimWhitespaceFilterRules,
} from './engine/services/predefined-rules';
export { createMetadataFilter } from './engine/services/metadata-filter';
export type { FieldRules, MetadataFilter } from './engine/services/metadata-filter';
export { createLogger, getLogBuffer, clearLogBuffer, setLogEcho } from './engine/logger';
export type { Logger } from './engine/logger';

export {
  RuleDefinitionSchema,
  RuleTableSchema,
  FilterOptionsSchema,
  DEFAULT_FILTER_OPTIONS,
} from './types/zod-schemas';
export type { RuleDefinition, RuleTableInput, FilterOptions } from './types/zod-schemas';
export { PatternKind } from './types/filter-rule';
export type {
  PatternSpec,
  PatternInput,
  RegexPatternSpec,
  LiteralPatternSpec,
  RuleTableError,
} from './types/filter-rule';
export { MetadataField, METADATA_FIELDS } from './types/metadata-filter';
export { DiagLogLevel } from './types/diagnostic';
export type { DiagLogEntry } from './types/diagnostic';

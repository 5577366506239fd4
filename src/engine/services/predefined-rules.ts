/**
 * Predefined rule tables.
 * The tables live in data/predefined-rules.json and are validated and compiled
 * on first access, then cached for the lifetime of the process.
 */
import type { PredefinedRulesFile } from '@shared/zod-schemas';
import { PredefinedRulesFileSchema } from '@shared/zod-schemas';
import rawTables from '../data/predefined-rules.json';
import { createLogger } from '../logger';
import type { RuleSet } from './rule-set';
import { compileRuleDefinitions } from './rule-table';

const logger = createLogger('predefined-rules');

export const PredefinedTable = {
  Youtube: 'youtube',
  TrimSymbols: 'trimSymbols',
  Remastered: 'remastered',
  Live: 'live',
  CleanExplicit: 'cleanExplicit',
  Feature: 'feature',
  NormalizeFeature: 'normalizeFeature',
  Version: 'version',
  Suffix: 'suffix',
  TrimWhitespace: 'trimWhitespace',
} as const;
export type PredefinedTable = (typeof PredefinedTable)[keyof typeof PredefinedTable];

/** Cached file contents and compiled tables */
let cachedFile: PredefinedRulesFile | null = null;
const cachedSets = new Map<PredefinedTable, RuleSet>();

function loadFile(): PredefinedRulesFile {
  if (cachedFile !== null) return cachedFile;
  const parsed = PredefinedRulesFileSchema.safeParse(rawTables);
  if (!parsed.success) {
    logger.error('Predefined rule data failed validation', parsed.error);
    throw parsed.error;
  }
  cachedFile = parsed.data;
  return cachedFile;
}

/**
 * Get a predefined table by name.
 * @throws Error when the shipped data for the table is missing or invalid
 */
export function getPredefinedRuleSet(name: PredefinedTable): RuleSet {
  const cached = cachedSets.get(name);
  if (cached !== undefined) return cached;

  const table = loadFile().tables[name];
  if (table === undefined) {
    const err = new Error(`Predefined rule table "${name}" is missing`);
    logger.error('Cannot load predefined table', err);
    throw err;
  }

  const result = compileRuleDefinitions(table.rules, `predefined table "${name}"`);
  if (!result.ok) {
    const detail = result.errors.map((e) => `#${String(e.position)} ${e.message}`).join('; ');
    const err = new Error(`Predefined rule table "${name}" is invalid: ${detail}`);
    logger.error('Cannot compile predefined table', err);
    throw err;
  }

  cachedSets.set(name, result.ruleSet);
  return result.ruleSet;
}

/** Description stored with a predefined table */
export function describePredefinedTable(name: PredefinedTable): string | undefined {
  return loadFile().tables[name]?.description;
}

/** Remove video-site boilerplate from track titles. */
export function youtubeTrackFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.Youtube);
}

/** Remove leftovers of other filters (empty brackets, edge separators). */
export function trimSymbolsFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.TrimSymbols);
}

export function remasteredFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.Remastered);
}

export function liveFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.Live);
}

export function cleanExplicitFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.CleanExplicit);
}

export function featureFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.Feature);
}

/** "Song (feat. X)" -> "Song feat. X" */
export function normalizeFeatureFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.NormalizeFeature);
}

export function versionFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.Version);
}

/** "Track - X Remix" -> "Track (X Remix)" */
export function suffixFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.Suffix);
}

export function trimWhitespaceFilterRules(): RuleSet {
  return getPredefinedRuleSet(PredefinedTable.TrimWhitespace);
}

/**
 * Drop compiled tables (for testing).
 */
export function clearPredefinedCache(): void {
  cachedFile = null;
  cachedSets.clear();
}

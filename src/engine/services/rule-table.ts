/**
 * Rule tables supplied at run time.
 *
 * Text format: pattern[TAB]replacement[TAB]flags (one rule per line).
 * Empty lines, whitespace-only lines without a tab and lines starting with ;
 * are skipped.
 * No tab = remove matches (empty replacement).
 * Only a trailing \r is stripped; whitespace inside a pattern is significant.
 *
 * A table with any bad rule produces no RuleSet at all.
 */
import type { PatternSpec, RuleTableError } from '@shared/filter-rule';
import { PatternKind } from '@shared/filter-rule';
import type { RuleDefinition } from '@shared/zod-schemas';
import { RuleTableSchema } from '@shared/zod-schemas';
import { createLogger } from '../logger';
import { compileFilterRule, type FilterRule } from './filter-rule';
import { RuleSet } from './rule-set';

const logger = createLogger('rule-table');

const MAX_COLUMNS = 3;

export type RuleTableParseResult =
  | { readonly ok: true; readonly ruleSet: RuleSet }
  | { readonly ok: false; readonly errors: readonly RuleTableError[] };

export type RuleTableLoadResult =
  | {
      readonly ok: true;
      readonly name: string;
      readonly description: string | undefined;
      readonly ruleSet: RuleSet;
    }
  | { readonly ok: false; readonly errors: readonly RuleTableError[] };

function finish(
  rules: readonly FilterRule[],
  errors: readonly RuleTableError[],
  label: string,
): RuleTableParseResult {
  if (errors.length > 0) {
    logger.warn(`Rejected ${label}: ${String(errors.length)} invalid rule(s)`);
    return { ok: false, errors };
  }
  return { ok: true, ruleSet: RuleSet.from(rules) };
}

/**
 * Parse a tab-separated rule table.
 */
export function parseRuleTable(content: string): RuleTableParseResult {
  const rules: FilterRule[] = [];
  const errors: RuleTableError[] = [];

  content.split('\n').forEach((raw, idx) => {
    const lineNo = idx + 1;
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (line.length === 0) return;
    const hasTab = line.includes('\t');
    const trimmed = line.trimStart();
    // A whitespace-only pattern is still a rule once a tab follows it
    if (!hasTab && trimmed.length === 0) return;
    if (trimmed.startsWith(';')) return;

    const columns = line.split('\t');
    if (columns.length > MAX_COLUMNS) {
      errors.push({
        position: lineNo,
        message: `Too many columns (expected at most ${String(MAX_COLUMNS)})`,
      });
      return;
    }

    const [source = '', replacement = '', flags = ''] = columns;
    if (source.length === 0) {
      errors.push({ position: lineNo, message: 'Pattern must not be empty' });
      return;
    }

    const result = compileFilterRule({ kind: PatternKind.Regex, source, flags }, replacement);
    if (result.ok) {
      rules.push(result.rule);
    } else {
      errors.push({ position: lineNo, message: result.error.message });
    }
  });

  return finish(rules, errors, 'rule table text');
}

function definitionPattern(def: RuleDefinition): PatternSpec {
  if (def.literal === true) {
    // Only case-insensitivity carries over to literal patterns
    return { kind: PatternKind.Literal, text: def.pattern, ignoreCase: def.flags?.includes('i') };
  }
  return { kind: PatternKind.Regex, source: def.pattern, flags: def.flags };
}

/**
 * Compile structured rule definitions in order.
 * Error positions are 0-based definition indices.
 */
export function compileRuleDefinitions(
  definitions: readonly RuleDefinition[],
  label = 'rule definitions',
): RuleTableParseResult {
  const rules: FilterRule[] = [];
  const errors: RuleTableError[] = [];

  definitions.forEach((def, idx) => {
    const result = compileFilterRule(definitionPattern(def), def.replacement ?? '');
    if (result.ok) {
      rules.push(result.rule);
    } else {
      errors.push({ position: idx, message: result.error.message });
    }
  });

  return finish(rules, errors, label);
}

/**
 * Validate an untrusted JSON rule table and compile it.
 */
export function loadRuleTable(input: unknown): RuleTableLoadResult {
  const parsed = RuleTableSchema.safeParse(input);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue): RuleTableError => {
      const [head, index] = issue.path;
      return {
        position: head === 'rules' && typeof index === 'number' ? index : -1,
        message: `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      };
    });
    logger.warn(`Rejected rule table: ${String(errors.length)} schema issue(s)`);
    return { ok: false, errors };
  }

  const table = parsed.data;
  const result = compileRuleDefinitions(table.rules, `table "${table.name}"`);
  if (!result.ok) return result;
  return { ok: true, name: table.name, description: table.description, ruleSet: result.ruleSet };
}

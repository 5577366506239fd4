/**
 * Rule application.
 * Rules run strictly left to right; each rule sees the previous rule's output.
 */
import { FilterOptionsSchema, DEFAULT_FILTER_OPTIONS } from '@shared/zod-schemas';
import type { FilterOptions } from '@shared/zod-schemas';
import { createLogger } from '../logger';
import type { FilterRule } from './filter-rule';
import { RuleSet } from './rule-set';

const logger = createLogger('apply-rules');

export type RuleSource = RuleSet | readonly FilterRule[];

function rulesOf(source: RuleSource): readonly FilterRule[] {
  return source instanceof RuleSet ? source.rules : source;
}

/**
 * Apply each rule once, in order.
 */
export function applyRules(text: string, rules: RuleSource): string {
  let result = text;
  for (const rule of rulesOf(rules)) {
    result = rule.apply(result);
  }
  return result;
}

/**
 * Apply the rules repeatedly until a pass changes nothing.
 * Stops after `maxPasses` and returns the last output if the text never settles.
 * The limit counts passes; a rule that keeps lengthening its own output can
 * still hit the runtime's string length limit (RangeError) within it.
 */
export function applyRulesUntilStable(
  text: string,
  rules: RuleSource,
  options: Partial<FilterOptions> = {},
): string {
  const { maxPasses } = FilterOptionsSchema.parse({
    maxPasses: options.maxPasses ?? DEFAULT_FILTER_OPTIONS.maxPasses,
  });

  let prev = text;
  for (let pass = 1; pass <= maxPasses; pass++) {
    const next = applyRules(prev, rules);
    if (next === prev) return next;
    prev = next;
  }

  logger.warn(`Text still changing after ${String(maxPasses)} passes; returning last result`);
  return prev;
}

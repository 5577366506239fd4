/**
 * Ordered, immutable collection of filter rules.
 * Insertion order is application order; nothing is sorted or deduplicated.
 */
import type { FilterRule } from './filter-rule';

export class RuleSet implements Iterable<FilterRule> {
  private static readonly EMPTY = new RuleSet([]);

  readonly rules: readonly FilterRule[];

  private constructor(rules: readonly FilterRule[]) {
    this.rules = Object.freeze(rules);
    Object.freeze(this);
  }

  static from(rules: Iterable<FilterRule>): RuleSet {
    return new RuleSet([...rules]);
  }

  static empty(): RuleSet {
    return RuleSet.EMPTY;
  }

  /** `a`'s rules followed by `b`'s */
  static combine(a: RuleSet, b: RuleSet): RuleSet {
    return new RuleSet([...a.rules, ...b.rules]);
  }

  concat(...others: readonly RuleSet[]): RuleSet {
    return new RuleSet([this, ...others].flatMap((set) => set.rules));
  }

  get size(): number {
    return this.rules.length;
  }

  [Symbol.iterator](): Iterator<FilterRule> {
    return this.rules[Symbol.iterator]();
  }
}

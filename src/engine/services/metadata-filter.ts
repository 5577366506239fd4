/**
 * Field-wise filtering of track metadata.
 * Each field carries its own RuleSet; fields without one pass through unchanged.
 */
import type { MetadataField } from '@shared/metadata-filter';
import { METADATA_FIELDS } from '@shared/metadata-filter';
import { applyRules } from './apply-rules';
import { RuleSet } from './rule-set';

export type FieldRules = Partial<Record<MetadataField, RuleSet>>;

export interface MetadataFilter {
  /** Apply the field's rules; unknown fields return `text` as is */
  filterField(field: MetadataField, text: string): string;
  canFilterField(field: MetadataField): boolean;
  /** New filter running this filter's rules first, then `other`'s */
  extend(other: MetadataFilter): MetadataFilter;
  /** Rules registered for a field (empty set when none) */
  rulesFor(field: MetadataField): RuleSet;
}

export function createMetadataFilter(fieldRules: FieldRules): MetadataFilter {
  const rules: FieldRules = Object.freeze({ ...fieldRules });

  const filter: MetadataFilter = {
    filterField(field, text) {
      const set = rules[field];
      return set === undefined ? text : applyRules(text, set);
    },
    canFilterField(field) {
      return rules[field] !== undefined;
    },
    rulesFor(field) {
      return rules[field] ?? RuleSet.empty();
    },
    extend(other) {
      const merged: FieldRules = {};
      for (const field of METADATA_FIELDS) {
        if (filter.canFilterField(field) || other.canFilterField(field)) {
          merged[field] = RuleSet.combine(filter.rulesFor(field), other.rulesFor(field));
        }
      }
      return createMetadataFilter(merged);
    },
  };
  return filter;
}

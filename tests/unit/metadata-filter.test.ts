import { describe, it, expect } from 'vitest';
import { createMetadataFilter } from '../../src/engine/services/metadata-filter';
import { FilterRule } from '../../src/engine/services/filter-rule';
import { RuleSet } from '../../src/engine/services/rule-set';

const removeLive = FilterRule.create(String.raw`\s\(Live\)$`, '');
const removeBrackets = FilterRule.create(String.raw`\[.*?\]`, '');
const trimTrailing = FilterRule.create(String.raw`\s+$`, '');
const dropArticle = FilterRule.create({ kind: 'literal', text: 'The ' }, '');

describe('createMetadataFilter', () => {
  const filter = createMetadataFilter({ track: RuleSet.from([removeLive]) });

  it('applies the rules registered for a field', () => {
    expect(filter.filterField('track', 'Song (Live)')).toBe('Song');
  });

  it('passes other fields through', () => {
    expect(filter.filterField('album', 'Album (Live)')).toBe('Album (Live)');
  });

  it('reports which fields it can filter', () => {
    expect(filter.canFilterField('track')).toBe(true);
    expect(filter.canFilterField('album')).toBe(false);
  });

  it('returns an empty set for fields without rules', () => {
    expect(filter.rulesFor('artist').size).toBe(0);
  });
});

describe('MetadataFilter.extend', () => {
  const first = createMetadataFilter({ track: RuleSet.from([removeBrackets]) });
  const second = createMetadataFilter({
    track: RuleSet.from([trimTrailing]),
    artist: RuleSet.from([dropArticle]),
  });
  const extended = first.extend(second);

  it('runs the receiver rules before the other filter', () => {
    expect(extended.rulesFor('track').rules).toEqual([removeBrackets, trimTrailing]);
    expect(extended.filterField('track', 'Song [HD] ')).toBe('Song');
  });

  it('includes fields only the other filter has', () => {
    expect(extended.filterField('artist', 'The Band')).toBe('Band');
  });

  it('skips fields neither filter has', () => {
    expect(extended.canFilterField('album')).toBe(false);
  });

  it('leaves both originals unchanged', () => {
    expect(first.canFilterField('artist')).toBe(false);
    expect(second.rulesFor('track').size).toBe(1);
  });
});

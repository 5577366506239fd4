import { describe, it, expect } from 'vitest';
import { FilterRule, compileFilterRule, escapeRegExp } from '../../src/engine/services/filter-rule';
import { InvalidPatternError } from '../../src/engine/services/invalid-pattern';

describe('FilterRule.create', () => {
  it('accepts a well-formed regex source', () => {
    const rule = FilterRule.create(String.raw`\(feat\..*?\)`, '');
    expect(rule.pattern).toEqual({ kind: 'regex', source: String.raw`\(feat\..*?\)` });
    expect(rule.replacement).toBe('');
  });

  it('accepts a literal pattern', () => {
    const rule = FilterRule.create({ kind: 'literal', text: '(((' }, '');
    expect(rule.apply('a(((b')).toBe('ab');
  });

  it('throws InvalidPatternError for unbalanced grouping', () => {
    expect(() => FilterRule.create('(unbalanced', '')).toThrow(InvalidPatternError);
  });

  it('rejects the sticky flag', () => {
    expect(() => FilterRule.create({ kind: 'regex', source: 'a', flags: 'y' })).toThrow(
      'sticky flag "y" is not supported',
    );
  });

  it('rejects unknown flags', () => {
    expect(() => FilterRule.create({ kind: 'regex', source: 'a', flags: 'q' })).toThrow(
      InvalidPatternError,
    );
  });

  it('takes source and flags from a RegExp', () => {
    const rule = FilterRule.create(/LIVE/i, 'live');
    expect(rule.pattern).toEqual({ kind: 'regex', source: 'LIVE', flags: 'i' });
    expect(rule.apply('Live and LIVE')).toBe('live and live');
  });

  it('is not affected by the lastIndex of the RegExp it was built from', () => {
    const re = /a/g;
    re.lastIndex = 2;
    const rule = FilterRule.create(re, 'b');
    expect(rule.apply('aaa')).toBe('bbb');
    expect(re.lastIndex).toBe(2);
  });

  it('is frozen', () => {
    const rule = FilterRule.create('x', 'y');
    expect(Object.isFrozen(rule)).toBe(true);
    expect(Object.isFrozen(rule.pattern)).toBe(true);
  });
});

describe('compileFilterRule', () => {
  it('returns the rule on success', () => {
    const result = compileFilterRule('\\s+$', '');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.rule.apply('Title  ')).toBe('Title');
    }
  });

  it('returns the error instead of throwing', () => {
    const result = compileFilterRule('(a', '');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidPatternError);
      expect(result.error.name).toBe('InvalidPatternError');
      expect(result.error.source).toBe('(a');
      expect(result.error.flags).toBe('');
      expect(result.error.cause).toBeInstanceOf(SyntaxError);
    }
  });
});

describe('FilterRule.apply', () => {
  it('strips a featuring note', () => {
    const rule = FilterRule.create(String.raw`\(feat\..*?\)`, '');
    expect(rule.apply('Song Title (feat. Someone)')).toBe('Song Title ');
  });

  it('replaces an official video suffix with a space', () => {
    const rule = FilterRule.create(String.raw`\s*\(Official Video\)\s*`, ' ');
    expect(rule.apply('Artist - Track (Official Video)')).toBe('Artist - Track ');
  });

  it('replaces every match', () => {
    expect(FilterRule.create('o', '0').apply('foo boo')).toBe('f00 b00');
  });

  it('returns the input when nothing matches', () => {
    const input = 'Nothing to see here';
    expect(FilterRule.create('zzz', '').apply(input)).toBe(input);
  });

  it('leaves empty text empty when the pattern needs characters', () => {
    expect(FilterRule.create('x+', 'y').apply('')).toBe('');
  });

  it('substitutes zero-width matches', () => {
    expect(FilterRule.create('^', '> ').apply('')).toBe('> ');
    expect(FilterRule.create('', '-').apply('ab')).toBe('-a-b-');
  });

  it('matches literal text without regex meaning', () => {
    const rule = FilterRule.create({ kind: 'literal', text: 'a.b' }, 'X');
    expect(rule.apply('a.b axb a.b')).toBe('X axb X');
  });

  it('honours ignoreCase on literal patterns', () => {
    const rule = FilterRule.create({ kind: 'literal', text: 'feat.', ignoreCase: true }, 'ft.');
    expect(rule.apply('A FEAT. B')).toBe('A ft. B');
  });

  it('expands positional groups', () => {
    const rule = FilterRule.create(String.raw`(\w+) - (\w+)`, '$2 by $1');
    expect(rule.apply('Artist - Track')).toBe('Track by Artist');
  });

  it('expands named groups', () => {
    const rule = FilterRule.create(String.raw`(?<artist>\w+) - (?<title>\w+)`, '${title} ($<artist>)');
    expect(rule.apply('Foo - Bar')).toBe('Bar (Foo)');
  });

  it('expands groups missing from the pattern to nothing', () => {
    expect(FilterRule.create('(a)', '[$1$2$15]').apply('a')).toBe('[a]');
  });

  it('expands groups that did not participate to nothing', () => {
    expect(FilterRule.create('(x)?b', '<$1>').apply('b xb')).toBe('<> <x>');
  });
});

describe('FilterRule.toString', () => {
  it('shows the compiled regex and the replacement', () => {
    expect(FilterRule.create('\\s+$', '').toString()).toBe('/\\s+$/g -> ""');
  });
});

describe('escapeRegExp', () => {
  it('escapes metacharacters', () => {
    expect(escapeRegExp('a.b*(c)')).toBe('a\\.b\\*\\(c\\)');
  });
});

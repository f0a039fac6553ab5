import { describe, it, expect } from 'vitest';
import {
  ColonTermMatcher,
  QuotedTermMatcher,
  SemicolonRunMatcher,
  UnquotedTermMatcher,
  startsNewTerm,
} from './DefinitionMatchers.js';

describe('QuotedTermMatcher', () => {
  const matcher = new QuotedTermMatcher();

  it('matches straight and curly quoted terms', () => {
    expect(matcher.attempt('"Processor" means a central processing unit.')).toEqual([
      { term: 'Processor', definition: 'a central processing unit.', pattern: 'quoted' },
    ]);
    expect(matcher.attempt('“Affiliate” shall mean any entity under common control.')).toEqual([
      { term: 'Affiliate', definition: 'any entity under common control.', pattern: 'quoted' },
    ]);
  });

  it('matches single-quoted terms', () => {
    expect(matcher.attempt('‘Processor’ means a central processing unit.')).toEqual([
      { term: 'Processor', definition: 'a central processing unit.', pattern: 'quoted' },
    ]);
    expect(matcher.attempt("'Territory' means the United Kingdom.")).toEqual([
      { term: 'Territory', definition: 'the United Kingdom.', pattern: 'quoted' },
    ]);
  });

  it('skips a parenthetical between the term and the trigger', () => {
    expect(matcher.attempt('"Order" (or "Order Form") means the ordering document.')?.[0].definition).toBe(
      'the ordering document.'
    );
  });

  it('declines a unit holding several quoted definitions', () => {
    expect(matcher.attempt('"Core" means a processing core; "Server" means a computer.')).toBeNull();
  });
});

describe('UnquotedTermMatcher', () => {
  const matcher = new UnquotedTermMatcher();

  it('matches a title-case term at the start of the unit', () => {
    expect(matcher.attempt('Licensed Programs means the software listed in the Order Form.')).toEqual([
      { term: 'Licensed Programs', definition: 'the software listed in the Order Form.', pattern: 'unquoted' },
    ]);
  });

  it('allows a leading clause number and lower-case connectors', () => {
    expect(matcher.attempt('1.4 Term of Use means the period stated in the Order.')?.[0].term).toBe('Term of Use');
  });

  it('rejects ordinary sentences opened by a demonstrative', () => {
    expect(matcher.attempt('This Agreement means the whole of the terms.')).toBeNull();
  });
});

describe('ColonTermMatcher', () => {
  it('matches a short title-case label followed by a colon', () => {
    expect(new ColonTermMatcher().attempt('Territory: the United Kingdom')).toEqual([
      { term: 'Territory', definition: 'the United Kingdom', pattern: 'colon' },
    ]);
  });
});

describe('SemicolonRunMatcher', () => {
  const matcher = new SemicolonRunMatcher();

  it('splits a run of single-quoted definitions', () => {
    expect(matcher.attempt('‘Core’ means a processing core; ‘Server’ means a computer.')).toEqual([
      { term: 'Core', definition: 'a processing core', pattern: 'semicolon_run' },
      { term: 'Server', definition: 'a computer.', pattern: 'semicolon_run' },
    ]);
  });

  it('splits a run of quoted definitions', () => {
    expect(matcher.attempt('"Core" means a processing core; "Server" means a computer.')).toEqual([
      { term: 'Core', definition: 'a processing core', pattern: 'semicolon_run' },
      { term: 'Server', definition: 'a computer.', pattern: 'semicolon_run' },
    ]);
  });

  it('declines a single definition', () => {
    expect(matcher.attempt('"Core" means a processing core.')).toBeNull();
  });
});

describe('startsNewTerm', () => {
  it('detects the start of another definition', () => {
    expect(startsNewTerm('"Server" means a computer.')).toBe(true);
    expect(startsNewTerm('and any replacement thereof.')).toBe(false);
  });
});

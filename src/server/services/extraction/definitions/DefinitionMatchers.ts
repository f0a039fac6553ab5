/**
 * Definition matchers
 *
 * Each matcher inspects one line unit and either declines (null) or returns the
 * raw (term, definition) pairs it found. The extractor tries them in order and the
 * first success wins for that unit:
 *
 * A. quoted      "Processor" means ...
 * B. unquoted    Licensed Programs means ...
 * C. colon       Territory: the United Kingdom
 * D. run         "A" means ...; "B" means ...
 */

import type { DefinitionPattern } from '../../../contracts/types.js';

export interface DefinitionMatch {
  term: string;
  definition: string;
  pattern: DefinitionPattern;
}

export interface DefinitionMatcher {
  readonly pattern: DefinitionPattern;
  attempt(unit: string): DefinitionMatch[] | null;
}

const TRIGGER = '(?:shall mean|means|has the meaning|is defined as)';
const CLAUSE_PREFIX = '(?:\\d{1,3}(?:\\.\\d{1,3})*\\.?\\s+|\\(?[a-z0-9]{1,4}\\)\\s+)?';
const TITLE_WORD = "[A-Z][A-Za-z0-9'&/-]*";
const CONNECTOR = '(?:of|and|the|for|in|to|on)';

// Double-quoted term in group 1, single-quoted term in group 2
const QUOTED_TERM = `(?:["“]([^"“”\\n]{1,200})["”]|['‘]([^'‘’\\n]{1,200})['’])`;
const QUOTED_DEFINITION = new RegExp(`${QUOTED_TERM}\\s*(?:\\([^)]*\\)\\s*)?${TRIGGER}\\b\\s*[:,]?\\s*(.*)$`, 'is');
const QUOTED_TRIGGER = new RegExp(`${QUOTED_TERM}\\s*(?:\\([^)]*\\)\\s*)?${TRIGGER}\\b`, 'i');
const QUOTED_TRIGGER_GLOBAL = new RegExp(QUOTED_TRIGGER.source, 'gi');
const UNQUOTED_DEFINITION = new RegExp(
  `^${CLAUSE_PREFIX}(${TITLE_WORD}(?:\\s+(?:${TITLE_WORD}|${CONNECTOR}))*)\\s+${TRIGGER}\\b\\s*[:,]?\\s*(.*)$`,
  's'
);
const COLON_DEFINITION = new RegExp(`^${CLAUSE_PREFIX}(${TITLE_WORD}(?:\\s+${TITLE_WORD}){0,5})\\s*:\\s+(.+)$`, 's');
const RUN_SEPARATOR = /(?:;\s*(?:and\s+|or\s+)?|(?<=\.)\s+)(?=["“'‘])/;

function matchQuoted(text: string): { term: string; definition: string } | null {
  const match = QUOTED_DEFINITION.exec(text);
  if (!match) return null;
  return { term: match[1] ?? match[2], definition: match[3] };
}

/** Demonstratives and quantifiers that open ordinary sentences, not defined terms */
const NON_TERM_OPENERS = new Set(['This', 'That', 'These', 'Those', 'It', 'Such', 'Each', 'Any', 'Which', 'All']);

export class QuotedTermMatcher implements DefinitionMatcher {
  readonly pattern = 'quoted' as const;

  attempt(unit: string): DefinitionMatch[] | null {
    const match = matchQuoted(unit);
    if (!match) return null;
    // A run of several quoted definitions belongs to the semicolon-run matcher
    if (QUOTED_TRIGGER.test(match.definition)) return null;
    return [{ ...match, pattern: this.pattern }];
  }
}

export class UnquotedTermMatcher implements DefinitionMatcher {
  readonly pattern = 'unquoted' as const;

  attempt(unit: string): DefinitionMatch[] | null {
    const match = UNQUOTED_DEFINITION.exec(unit);
    if (!match) return null;
    const term = match[1].trim();
    const firstWord = term.split(/\s+/)[0];
    if (NON_TERM_OPENERS.has(firstWord)) return null;
    return [{ term, definition: match[2], pattern: this.pattern }];
  }
}

export class ColonTermMatcher implements DefinitionMatcher {
  readonly pattern = 'colon' as const;

  attempt(unit: string): DefinitionMatch[] | null {
    const match = COLON_DEFINITION.exec(unit);
    if (!match) return null;
    return [{ term: match[1], definition: match[2], pattern: this.pattern }];
  }
}

export class SemicolonRunMatcher implements DefinitionMatcher {
  readonly pattern = 'semicolon_run' as const;

  attempt(unit: string): DefinitionMatch[] | null {
    const triggers = unit.match(QUOTED_TRIGGER_GLOBAL) ?? [];
    if (triggers.length < 2) return null;

    const matches: DefinitionMatch[] = [];
    for (const part of unit.split(RUN_SEPARATOR)) {
      const match = matchQuoted(part);
      if (match) {
        matches.push({ ...match, pattern: this.pattern });
      }
    }
    return matches.length >= 2 ? matches : null;
  }
}

export const DEFAULT_MATCHERS: readonly DefinitionMatcher[] = [
  new QuotedTermMatcher(),
  new UnquotedTermMatcher(),
  new ColonTermMatcher(),
  new SemicolonRunMatcher(),
];

/**
 * True when a unit opens a new defined term (used to stop multi-line merges)
 */
export function startsNewTerm(unit: string): boolean {
  const trimmed = unit.trim();
  return QUOTED_TRIGGER.test(trimmed) || DEFAULT_MATCHERS.some((matcher) => matcher.attempt(trimmed) !== null);
}

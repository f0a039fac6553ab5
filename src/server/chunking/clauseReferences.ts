/**
 * Clause reference detection from a block's leading text.
 *
 * Patterns are tried in order and the first match wins:
 * 1. numeric dotted            "2.3 The Licensee ..."      -> 2.3, level 2
 * 2. numeric + parenthetical   "2.3(a) the Programs ..."   -> 2.3(a), level 3
 * 3. lettered sub-item         "(b) any Updates ..."       -> (b), level 1
 */

export type ClauseReferenceKind = 'numeric' | 'numeric_parenthetical' | 'lettered';

export interface ClauseReference {
  clauseRef: string;
  clauseLevel: number;
  kind: ClauseReferenceKind;
}

interface ClausePattern {
  kind: ClauseReferenceKind;
  regex: RegExp;
  toReference(match: RegExpExecArray): ClauseReference;
}

// Segments are capped at three digits so years and amounts never read as clause numbers
const CLAUSE_PATTERNS: readonly ClausePattern[] = [
  {
    kind: 'numeric',
    regex: /^\s*(\d{1,3}(?:\.\d{1,3})*)\.?(?=\s|$)/,
    toReference: (match) => ({
      clauseRef: match[1],
      clauseLevel: match[1].split('.').length,
      kind: 'numeric',
    }),
  },
  {
    kind: 'numeric_parenthetical',
    regex: /^\s*(\d{1,3}(?:\.\d{1,3})*)((?:\([a-z0-9]{1,4}\))+)/i,
    toReference: (match) => ({
      clauseRef: `${match[1]}${match[2]}`,
      clauseLevel: match[1].split('.').length + (match[2].match(/\(/g) ?? []).length,
      kind: 'numeric_parenthetical',
    }),
  },
  {
    kind: 'lettered',
    regex: /^\s*\(?([a-z]|[ivx]{2,5})\)\s+/,
    toReference: (match) => ({
      clauseRef: `(${match[1]})`,
      clauseLevel: 1,
      kind: 'lettered',
    }),
  },
];

/**
 * Extract the clause reference at the start of text, if any
 */
export function extractClauseReference(text: string): ClauseReference | null {
  if (!text) return null;
  for (const pattern of CLAUSE_PATTERNS) {
    const match = pattern.regex.exec(text);
    if (match) {
      return pattern.toReference(match);
    }
  }
  return null;
}

export function isLetteredClause(ref: string | undefined): boolean {
  return ref !== undefined && /^\((?:[a-z]|[ivx]{2,5})\)$/.test(ref);
}

/**
 * True when a line opens with a numeric clause number ("4.2 ", "12. ")
 */
export function startsWithNumericClause(text: string): boolean {
  const ref = extractClauseReference(text);
  return ref !== null && ref.kind !== 'lettered';
}

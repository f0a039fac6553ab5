/**
 * KeywordSearchService - in-process keyword retrieval over one chunk set
 *
 * Implements the SearchCollaborator contract so candidate selection can widen its
 * set without an external search service. Scores are query-token coverage in
 * [0, 1]; ties keep document order.
 */

import type { Chunk, ChunkSet, SearchCollaborator, SearchFilters, SearchHit, SearchMode } from '../../contracts/types.js';
import { logger } from '../../utils/logger.js';
import { makeSnippet } from '../../utils/textNormalization.js';

const TOKEN_PATTERN = /[a-z0-9']+/g;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Share of distinct query tokens present in the text
 */
export function keywordScore(query: string, text: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) return 0;
  const textTokens = new Set(tokenize(text));
  if (textTokens.size === 0) return 0;

  let hits = 0;
  for (const token of queryTokens) {
    if (textTokens.has(token)) hits++;
  }
  return hits / queryTokens.size;
}

export class KeywordSearchService implements SearchCollaborator {
  constructor(private readonly chunkSet: ChunkSet) {}

  async search(query: string, filters: SearchFilters = {}, mode: SearchMode = 'keyword'): Promise<SearchHit[]> {
    if (mode !== 'keyword') {
      logger.debug({ mode }, 'Keyword search serving a non-keyword mode with token scoring');
    }
    if (filters.docId && filters.docId !== this.chunkSet.docId) {
      return [];
    }

    const scored = this.chunkSet.chunks
      .filter((chunk) => matchesSectionFilter(chunk, filters.sectionPath))
      .map((chunk) => ({ chunk, score: keywordScore(query, chunk.text) }))
      .filter(({ score }) => score > 0);

    // Array.prototype.sort is stable, so equal scores stay in document order
    scored.sort((a, b) => b.score - a.score);

    return scored.map(({ chunk, score }) => ({
      chunkId: chunk.chunkId,
      score: Math.round(score * 1000) / 1000,
      snippet: snippetFor(query, chunk.text),
      sectionPath: [...chunk.sectionPath],
      ...(chunk.clauseRef ? { clauseRef: chunk.clauseRef } : {}),
      pageStart: chunk.pageStart,
      pageEnd: chunk.pageEnd,
    }));
  }
}

function matchesSectionFilter(chunk: Chunk, sectionPath: string[] | undefined): boolean {
  if (!sectionPath || sectionPath.length === 0) return true;
  return sectionPath.every((heading, i) => chunk.sectionPath[i] === heading);
}

/**
 * Centre on the whole query when it appears verbatim, else on its first matching token
 */
function snippetFor(query: string, text: string): string {
  const trimmed = query.trim();
  if (trimmed && text.toLowerCase().includes(trimmed.toLowerCase())) {
    return makeSnippet(text, trimmed);
  }
  const lower = text.toLowerCase();
  const token = tokenize(query).find((t) => lower.includes(t));
  return makeSnippet(text, token);
}

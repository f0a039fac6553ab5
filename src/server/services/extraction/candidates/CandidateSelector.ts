/**
 * CandidateSelector - bounded candidate sets per extraction concept
 *
 * Lanes run in strength order: section-path keyword match, full-text pattern
 * scan, then the optional search collaborator. A later lane only runs while the
 * set is below the coverage threshold. Search failures never fail selection;
 * they come back as warnings.
 */

import type {
  Candidate,
  CandidateReason,
  Chunk,
  ChunkSet,
  SearchCollaborator,
  SearchMode,
} from '../../../contracts/types.js';
import { getEnv } from '../../../config/env.js';
import { ExternalServiceError, isAppError } from '../../../types/errors.js';
import { logger } from '../../../utils/logger.js';
import { withTimeout } from '../../../utils/withTimeout.js';
import type { CandidateConcept } from './concepts.js';

export interface CandidateSelectorOptions {
  cap?: number;
  smallDocumentChunks?: number;
  coverageThreshold?: number;
  fallbackTopN?: number;
  searchTimeoutMs?: number;
  searchMode?: SearchMode;
  search?: SearchCollaborator;
}

export interface CandidateSelection {
  candidates: Candidate[];
  byReason: Record<CandidateReason, number>;
  truncated: boolean;
  warnings: string[];
}

const REASON_RANK: Record<CandidateReason, number> = {
  section_match: 0,
  pattern_match: 1,
  search_fallback: 2,
};

const selectorLogger = logger.child({ component: 'CandidateSelector' });

export class CandidateSelector {
  private readonly cap: number;
  private readonly smallDocumentChunks: number;
  private readonly coverageThreshold: number;
  private readonly fallbackTopN: number;
  private readonly searchTimeoutMs: number;
  private readonly searchMode: SearchMode;
  private readonly search?: SearchCollaborator;

  constructor(options: CandidateSelectorOptions = {}) {
    const env = getEnv();
    this.cap = options.cap ?? env.CANDIDATE_CAP;
    this.smallDocumentChunks = options.smallDocumentChunks ?? env.CANDIDATE_SMALL_DOC_CHUNKS;
    this.coverageThreshold = options.coverageThreshold ?? env.CANDIDATE_COVERAGE_THRESHOLD;
    this.fallbackTopN = options.fallbackTopN ?? env.SEARCH_FALLBACK_TOP_N;
    this.searchTimeoutMs = options.searchTimeoutMs ?? env.SEARCH_TIMEOUT_MS;
    this.searchMode = options.searchMode ?? 'hybrid';
    this.search = options.search;
  }

  async select(chunkSet: ChunkSet, concept: CandidateConcept): Promise<CandidateSelection> {
    const warnings: string[] = [];
    const selected = new Map<string, CandidateReason>();
    const eligible = chunkSet.chunks.filter((chunk) => !concept.excludedKinds.includes(chunk.kind));
    const sectionPattern = buildSectionPattern(concept.sectionKeywords);

    // 1. Section-path keyword matches
    for (const chunk of eligible) {
      if (sectionPattern && chunk.sectionPath.some((heading) => sectionPattern.test(heading))) {
        selected.set(chunk.chunkId, 'section_match');
      }
    }

    // 2. Full-text indicator scan
    if (selected.size < this.coverageThreshold) {
      for (const chunk of eligible) {
        if (selected.has(chunk.chunkId)) continue;
        if (concept.patternIndicators.some((indicator) => indicator.test(chunk.text))) {
          selected.set(chunk.chunkId, 'pattern_match');
        }
      }
    }

    // 3. Search fallback
    if (selected.size < this.coverageThreshold && this.search) {
      const eligibleIds = new Set(eligible.map((chunk) => chunk.chunkId));
      for (const query of concept.fallbackQueries) {
        const hitIds = await this.runFallbackQuery(this.search, query, chunkSet.docId, warnings);
        for (const chunkId of hitIds) {
          if (eligibleIds.has(chunkId) && !selected.has(chunkId)) {
            selected.set(chunkId, 'search_fallback');
          }
        }
      }
    }

    const ordered = eligible.filter((chunk) => selected.has(chunk.chunkId));
    const { kept, truncated } = this.applyCap(ordered, selected, chunkSet.chunks.length);
    if (truncated) {
      warnings.push(`Candidate set for ${concept.name} truncated to ${this.cap} of ${ordered.length} chunks`);
    }

    const byReason: Record<CandidateReason, number> = { section_match: 0, pattern_match: 0, search_fallback: 0 };
    const candidates: Candidate[] = [];
    for (const chunk of kept) {
      const reason = selected.get(chunk.chunkId) ?? 'search_fallback';
      byReason[reason]++;
      candidates.push({ chunkId: chunk.chunkId, reason, chunk });
    }

    selectorLogger.debug(
      { docId: chunkSet.docId, concept: concept.name, candidates: candidates.length, byReason, truncated },
      'Selected candidates'
    );

    return { candidates, byReason, truncated, warnings };
  }

  /**
   * Keep the strongest reasons first under the cap, then restore document order.
   * Documents below the size threshold are never truncated.
   */
  private applyCap(
    ordered: Chunk[],
    reasons: Map<string, CandidateReason>,
    documentChunkCount: number
  ): { kept: Chunk[]; truncated: boolean } {
    if (documentChunkCount < this.smallDocumentChunks || ordered.length <= this.cap) {
      return { kept: ordered, truncated: false };
    }

    const rank = (chunk: Chunk): number => REASON_RANK[reasons.get(chunk.chunkId) ?? 'search_fallback'];
    const survivors = [...ordered]
      .sort((a, b) => rank(a) - rank(b) || a.chunkIndex - b.chunkIndex)
      .slice(0, this.cap);
    const survivorIds = new Set(survivors.map((chunk) => chunk.chunkId));

    return { kept: ordered.filter((chunk) => survivorIds.has(chunk.chunkId)), truncated: true };
  }

  private async runFallbackQuery(
    search: SearchCollaborator,
    query: string,
    docId: string,
    warnings: string[]
  ): Promise<string[]> {
    try {
      const hits = await withTimeout(
        search.search(query, { docId }, this.searchMode),
        this.searchTimeoutMs,
        `Search fallback "${query}"`
      );
      return hits.slice(0, this.fallbackTopN).map((hit) => hit.chunkId);
    } catch (error) {
      const appError = isAppError(error)
        ? error
        : new ExternalServiceError('search', error instanceof Error ? error.message : String(error), { query });
      selectorLogger.warn({ docId, query, code: appError.code }, appError.message);
      warnings.push(appError.message);
      return [];
    }
  }
}

function buildSectionPattern(keywords: readonly string[]): RegExp | null {
  if (keywords.length === 0) return null;
  const alternatives = keywords.map((keyword) => keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\s+/g, '\\s+'));
  return new RegExp(`\\b(?:${alternatives.join('|')})\\b`, 'i');
}

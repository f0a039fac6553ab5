import { describe, it, expect, vi } from 'vitest';
import type { SearchCollaborator, SearchHit } from '../../../contracts/types.js';
import { makeChunkSet } from '../testing/fixtures.js';
import { CandidateSelector } from './CandidateSelector.js';
import { DEFINITIONS_CONCEPT } from './concepts.js';

const definitionsDoc = makeChunkSet([
  { text: '1. Definitions', kind: 'heading', sectionPath: ['1. Definitions'] },
  { text: '"Affiliate" means any entity under common control.', kind: 'definition', sectionPath: ['1. Definitions'] },
  { text: '"Processor" means a central processing unit.', kind: 'clause', sectionPath: ['5. Licence'], clauseRef: '5.1' },
  { text: 'Payment is due within thirty days.', kind: 'clause', sectionPath: ['6. Fees'], clauseRef: '6.1' },
]);

function hit(chunkId: string): SearchHit {
  return { chunkId, score: 1, snippet: '', sectionPath: [], pageStart: 1, pageEnd: 1 };
}

describe('CandidateSelector', () => {
  it('stops after the section lane once coverage is reached', async () => {
    const selector = new CandidateSelector({ coverageThreshold: 1 });
    const selection = await selector.select(definitionsDoc, DEFINITIONS_CONCEPT);

    expect(selection.candidates.map((c) => [c.chunkId, c.reason])).toEqual([['doc-test:v1:c1', 'section_match']]);
    expect(selection.byReason).toEqual({ section_match: 1, pattern_match: 0, search_fallback: 0 });
    expect(selection.truncated).toBe(false);
  });

  it('adds pattern matches below the coverage threshold and never selects headings', async () => {
    const selector = new CandidateSelector({ coverageThreshold: 5 });
    const selection = await selector.select(definitionsDoc, DEFINITIONS_CONCEPT);

    expect(selection.candidates.map((c) => [c.chunkId, c.reason])).toEqual([
      ['doc-test:v1:c1', 'section_match'],
      ['doc-test:v1:c2', 'pattern_match'],
    ]);
  });

  it('widens through the search collaborator and ignores ineligible hits', async () => {
    const search: SearchCollaborator = {
      search: vi.fn(async () => [hit('doc-test:v1:c3'), hit('doc-test:v1:c0')]),
    };
    const selector = new CandidateSelector({ coverageThreshold: 5, search });
    const selection = await selector.select(definitionsDoc, DEFINITIONS_CONCEPT);

    expect(search.search).toHaveBeenCalledTimes(DEFINITIONS_CONCEPT.fallbackQueries.length);
    expect(search.search).toHaveBeenCalledWith('means', { docId: 'doc-test' }, 'hybrid');
    expect(selection.candidates.map((c) => c.reason)).toEqual(['section_match', 'pattern_match', 'search_fallback']);
    expect(selection.byReason.search_fallback).toBe(1);
    expect(selection.warnings).toEqual([]);
  });

  it('records a search timeout as a warning', async () => {
    const search: SearchCollaborator = { search: () => new Promise<SearchHit[]>(() => {}) };
    const selector = new CandidateSelector({ coverageThreshold: 5, search, searchTimeoutMs: 5 });
    const selection = await selector.select(definitionsDoc, DEFINITIONS_CONCEPT);

    expect(selection.candidates).toHaveLength(2);
    expect(selection.warnings).toHaveLength(DEFINITIONS_CONCEPT.fallbackQueries.length);
    expect(selection.warnings[0]).toBe('Search fallback "means" timed out after 5ms');
  });

  it('records a search failure as an external service warning', async () => {
    const search: SearchCollaborator = { search: async () => Promise.reject(new Error('connection refused')) };
    const selector = new CandidateSelector({ coverageThreshold: 5, search });
    const selection = await selector.select(definitionsDoc, DEFINITIONS_CONCEPT);

    expect(selection.warnings[0]).toBe('External service error (search): connection refused');
  });

  describe('cap', () => {
    const doc = makeChunkSet([
      { text: '"Alpha" means the first.' },
      { text: '"Beta" means the second.' },
      { text: '"Gamma" means the third.', sectionPath: ['Definitions'] },
      { text: '"Delta" means the fourth.', sectionPath: ['Definitions'] },
    ]);

    it('keeps the strongest reasons and returns them in document order', async () => {
      const selector = new CandidateSelector({ cap: 2, smallDocumentChunks: 1, coverageThreshold: 10 });
      const selection = await selector.select(doc, DEFINITIONS_CONCEPT);

      expect(selection.candidates.map((c) => c.chunkId)).toEqual(['doc-test:v1:c2', 'doc-test:v1:c3']);
      expect(selection.truncated).toBe(true);
      expect(selection.warnings).toEqual(['Candidate set for definitions truncated to 2 of 4 chunks']);
    });

    it('is waived for small documents', async () => {
      const selector = new CandidateSelector({ cap: 2, smallDocumentChunks: 10, coverageThreshold: 10 });
      const selection = await selector.select(doc, DEFINITIONS_CONCEPT);

      expect(selection.candidates).toHaveLength(4);
      expect(selection.truncated).toBe(false);
    });
  });
});

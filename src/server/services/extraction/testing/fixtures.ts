import type { Chunk, ChunkSet } from '../../../contracts/types.js';

// ============================================================================
// Chunk builders for extraction tests
// ============================================================================

export const TEST_DOC_ID = 'doc-test';

export type ChunkOverrides = Partial<Chunk> & Pick<Chunk, 'text'>;

/**
 * Build a chunk; chunkId defaults to `${docId}:v1:c${chunkIndex}`
 */
export function makeChunk(chunkIndex: number, overrides: ChunkOverrides): Chunk {
  return {
    chunkId: `${TEST_DOC_ID}:v1:c${chunkIndex}`,
    docId: TEST_DOC_ID,
    chunkIndex,
    kind: 'paragraph',
    charLen: overrides.text.length,
    tokensEst: overrides.text.split(/\s+/).filter(Boolean).length,
    sectionPath: [],
    pageStart: 1,
    pageEnd: 1,
    sourceBlockIds: [`b${chunkIndex}`],
    bboxes: [],
    ...overrides,
  };
}

export function makeChunkSet(chunks: ChunkOverrides[]): ChunkSet {
  return {
    docId: TEST_DOC_ID,
    chunkedAt: '2026-01-15T00:00:00.000Z',
    chunking: { version: 'v1', ruleset: '2026-01', maxChars: 2000, maxListItems: 12 },
    chunks: chunks.map((overrides, index) => makeChunk(index, overrides)),
    excludedBlocks: [],
  };
}

export const FIXED_NOW = (): Date => new Date('2026-01-15T00:00:00.000Z');

import { describe, it, expect } from 'vitest';
import { generateChunkId, sha256Hex } from './fingerprints.js';

describe('generateChunkId', () => {
  it('formats ids as docId:version:hash', () => {
    expect(generateChunkId('doc-1', 'v1', '2026-01', ['b1', 'b2'])).toMatch(/^doc-1:v1:[0-9a-f]{16}$/);
  });

  it('hashes the structured key', () => {
    const key = JSON.stringify(['doc-1', ['b1'], 'v1/2026-01', null]);
    expect(generateChunkId('doc-1', 'v1', '2026-01', ['b1'])).toBe(`doc-1:v1:${sha256Hex(key).substring(0, 16)}`);
  });

  it('keeps block id boundaries apart', () => {
    expect(generateChunkId('doc-1', 'v1', '2026-01', ['a|b'])).not.toBe(generateChunkId('doc-1', 'v1', '2026-01', ['a', 'b']));
  });

  it('separates parts of one oversized block', () => {
    expect(generateChunkId('doc-1', 'v1', '2026-01', ['b1'], 0)).not.toBe(generateChunkId('doc-1', 'v1', '2026-01', ['b1'], 1));
    expect(generateChunkId('doc-1', 'v1', '2026-01', ['b1'], 0)).not.toBe(generateChunkId('doc-1', 'v1', '2026-01', ['b1']));
  });
});

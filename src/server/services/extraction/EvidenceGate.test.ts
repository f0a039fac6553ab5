import { describe, it, expect } from 'vitest';
import type { Evidence } from '../../contracts/types.js';
import { makeChunk } from './testing/fixtures.js';
import { EvidenceGate } from './EvidenceGate.js';

const chunk = makeChunk(0, { text: 'Schedule text', pageStart: 2, pageEnd: 3 });

function evidence(overrides: Partial<Evidence> = {}): Evidence {
  return { chunkId: chunk.chunkId, pageStart: 2, pageEnd: 3, snippet: 'Schedule text', ...overrides };
}

describe('EvidenceGate', () => {
  const gate = new EvidenceGate([chunk]);

  it('accepts evidence inside the chunk page range', () => {
    expect(gate.isComplete(evidence())).toBe(true);
    expect(gate.isComplete(evidence({ pageStart: 3 }))).toBe(true);
  });

  it('rejects evidence outside its chunk, for unknown chunks and for inverted ranges', () => {
    expect(gate.isComplete(evidence({ pageStart: 1 }))).toBe(false);
    expect(gate.isComplete(evidence({ chunkId: 'doc-test:v1:missing' }))).toBe(false);
    expect(gate.isComplete(evidence({ pageStart: 3, pageEnd: 2 }))).toBe(false);
  });

  it('checks shape only when no chunk set is given', () => {
    const shapeOnly = new EvidenceGate();
    expect(shapeOnly.isComplete(evidence({ chunkId: 'anywhere' }))).toBe(true);
    expect(shapeOnly.isComplete(evidence({ chunkId: '' }))).toBe(false);
    expect(shapeOnly.isComplete(evidence({ pageStart: 1.5 }))).toBe(false);
    expect(shapeOnly.isComplete(evidence({ pageStart: 0 }))).toBe(false);
  });

  it('drops records with no evidence or any incomplete entry and counts them', () => {
    const records = [
      { name: 'none', evidence: [] },
      { name: 'good', evidence: [evidence()] },
      { name: 'mixed', evidence: [evidence(), evidence({ pageEnd: 9 })] },
    ];

    const { kept, dropped } = gate.filter(records);

    expect(kept.map((r) => r.name)).toEqual(['good']);
    expect(dropped).toBe(2);
  });
});

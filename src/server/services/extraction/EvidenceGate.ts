/**
 * EvidenceGate - final pass over every extracted record
 *
 * A record survives only when each evidence entry names a chunk and carries a
 * complete page range (and, when the chunk set is known, a range inside that
 * chunk's pages). Dropped records are counted, never raised.
 */

import type { Chunk, Evidence } from '../../contracts/types.js';

export interface GateResult<T> {
  kept: T[];
  dropped: number;
}

function isPage(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

export class EvidenceGate {
  private readonly chunkRanges: Map<string, { pageStart: number; pageEnd: number }> | null;

  constructor(chunks?: readonly Chunk[]) {
    this.chunkRanges = chunks
      ? new Map(chunks.map((chunk) => [chunk.chunkId, { pageStart: chunk.pageStart, pageEnd: chunk.pageEnd }]))
      : null;
  }

  isComplete(evidence: Evidence): boolean {
    if (!evidence.chunkId) return false;
    if (!isPage(evidence.pageStart) || !isPage(evidence.pageEnd)) return false;
    if (evidence.pageEnd < evidence.pageStart) return false;

    if (this.chunkRanges) {
      const range = this.chunkRanges.get(evidence.chunkId);
      if (!range) return false;
      if (evidence.pageStart < range.pageStart || evidence.pageEnd > range.pageEnd) return false;
    }
    return true;
  }

  filter<T extends { evidence: readonly Evidence[] }>(records: readonly T[]): GateResult<T> {
    const kept: T[] = [];
    let dropped = 0;
    for (const record of records) {
      if (record.evidence.length > 0 && record.evidence.every((evidence) => this.isComplete(evidence))) {
        kept.push(record);
      } else {
        dropped++;
      }
    }
    return { kept, dropped };
  }
}

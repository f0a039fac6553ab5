/**
 * Human-readable chunk listing for reviewing chunk boundaries
 */

import type { ChunkSet } from '../contracts/types.js';

const PLACEHOLDER = '-';

export function renderChunkDebugMarkdown(chunkSet: ChunkSet): string {
  const lines: string[] = ['# Chunk Debug', '', `Document: ${chunkSet.docId}`, `Chunked at: ${chunkSet.chunkedAt}`];
  lines.push(`Chunking: ${chunkSet.chunking.version} / ${chunkSet.chunking.ruleset} (max ${chunkSet.chunking.maxChars} chars)`);
  lines.push('');

  chunkSet.chunks.forEach((chunk, idx) => {
    const sectionPath = chunk.sectionPath.join(' > ');
    lines.push(`## ${idx + 1}. ${chunk.kind} (p.${chunk.pageStart}-${chunk.pageEnd})`);
    lines.push(`chunk_id: \`${chunk.chunkId}\``);
    lines.push(`section_path: ${sectionPath || PLACEHOLDER}`);
    lines.push(`clause_ref: \`${chunk.clauseRef ?? PLACEHOLDER}\``);
    lines.push(`source_blocks: ${chunk.sourceBlockIds.join(', ')}`);
    lines.push('');
    lines.push('```text');
    lines.push(chunk.text);
    lines.push('```');
    lines.push('');
  });

  if (chunkSet.excludedBlocks.length > 0) {
    lines.push('## Excluded blocks');
    lines.push('');
    for (const excluded of chunkSet.excludedBlocks) {
      lines.push(`- ${excluded.blockId} (${excluded.reason}, p.${excluded.pageStart})`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

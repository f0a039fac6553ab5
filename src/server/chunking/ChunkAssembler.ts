/**
 * ChunkAssembler - merges and splits sectioned blocks into chunks
 *
 * Boundary rules:
 * - headings and tables are singleton chunks (tables are never split)
 * - consecutive body blocks are appended until the character ceiling, the
 *   list-item ceiling, a section change or a new numeric clause
 * - a page break closes the open chunk only once it is close to the ceiling
 * Size-driven splits carry the open clause reference into the continuation chunk.
 */

import type { BlockKind, BoundingBox, Chunk, ChunkKind, SectionedBlock } from '../contracts/types.js';
import { generateChunkId } from '../utils/fingerprints.js';
import { normalizeText } from '../utils/textNormalization.js';
import { isLetteredClause } from './clauseReferences.js';

export interface ChunkAssemblerConfig {
  docId: string;
  chunkingVersion: string;
  ruleset: string;
  maxChars: number;
  maxListItems: number;
  pageBreakFillRatio: number;
  retainNoise: boolean;
}

type BoundaryReason = 'section' | 'clause' | 'list_size' | 'size' | 'page';

interface OpenChunk {
  parts: string[];
  charLen: number;
  pageStart: number;
  pageEnd: number;
  sectionPath: string[];
  clauseRef?: string;
  clauseLevel?: number;
  sourceBlockIds: string[];
  sourceKinds: BlockKind[];
  bboxes: BoundingBox[];
  listItemCount: number;
}

const PARAGRAPH_SEPARATOR = '\n\n';
const DEFINITIONS_SECTION = /\b(?:definitions?|interpretation|defined terms)\b/i;
const SCHEDULE_SECTION = /\b(?:schedule|appendix|annex|exhibit)\b/i;

export class ChunkAssembler {
  constructor(private readonly config: ChunkAssemblerConfig) {}

  assemble(blocks: readonly SectionedBlock[]): Chunk[] {
    const chunks: Chunk[] = [];
    let current: OpenChunk | null = null;
    let precedingHeading: SectionedBlock | null = null;

    const flush = (): void => {
      if (current) {
        this.emitOpenChunk(current, chunks);
        current = null;
      }
    };

    for (const sectioned of blocks) {
      if (sectioned.noise && !this.config.retainNoise) continue;
      if (!sectioned.text) continue;

      const { block } = sectioned;
      const isTable = block.kind === 'table' || block.table !== undefined;

      if (sectioned.isHeading) {
        flush();
        this.emitHeading(sectioned, chunks);
        precedingHeading = sectioned;
        continue;
      }

      if (isTable) {
        flush();
        this.emitTable(sectioned, precedingHeading, chunks);
        precedingHeading = null;
        continue;
      }

      precedingHeading = null;

      if (sectioned.text.length > this.config.maxChars) {
        flush();
        this.emitOversized(sectioned, chunks);
        continue;
      }

      if (current === null) {
        current = openChunk(sectioned);
        continue;
      }

      const reason = this.boundaryReason(current, sectioned);
      if (reason) {
        const carried: OpenChunk = current;
        flush();
        current = openChunk(sectioned, isSizeBoundary(reason) ? carried : undefined);
        continue;
      }

      appendToChunk(current, sectioned);
    }

    flush();
    return chunks;
  }

  private boundaryReason(current: OpenChunk, next: SectionedBlock): BoundaryReason | null {
    if (current.sectionPath.join('\u0000') !== next.sectionPath.join('\u0000')) {
      return 'section';
    }

    // Lettered sub-items stay inside their parent clause
    if (
      current.clauseRef &&
      next.clauseRef &&
      next.clauseRef !== current.clauseRef &&
      !isLetteredClause(next.clauseRef)
    ) {
      return 'clause';
    }

    if (next.block.kind === 'list_item' && current.listItemCount >= this.config.maxListItems) {
      return 'list_size';
    }

    if (current.charLen + PARAGRAPH_SEPARATOR.length + next.text.length > this.config.maxChars) {
      return 'size';
    }

    if (
      next.block.pageStart > current.pageEnd &&
      current.charLen >= this.config.maxChars * this.config.pageBreakFillRatio
    ) {
      return 'page';
    }

    return null;
  }

  private emitHeading(sectioned: SectionedBlock, chunks: Chunk[]): void {
    this.pushChunk(chunks, {
      kind: 'heading',
      text: sectioned.text,
      sectionPath: sectioned.sectionPath,
      heading: sectioned.text,
      clauseRef: sectioned.clauseRef,
      clauseLevel: sectioned.clauseLevel,
      pageStart: sectioned.block.pageStart,
      pageEnd: sectioned.block.pageEnd,
      sourceBlockIds: [sectioned.block.blockId],
      bboxes: sectioned.block.bbox ? [sectioned.block.bbox] : [],
    });
  }

  private emitTable(sectioned: SectionedBlock, precedingHeading: SectionedBlock | null, chunks: Chunk[]): void {
    const sectionPath = precedingHeading ? precedingHeading.sectionPath : sectioned.sectionPath;
    const heading = precedingHeading?.text ?? sectionPath[sectionPath.length - 1];
    this.pushChunk(chunks, {
      kind: 'table',
      text: sectioned.text,
      sectionPath,
      heading,
      pageStart: sectioned.block.pageStart,
      pageEnd: sectioned.block.pageEnd,
      sourceBlockIds: [sectioned.block.blockId],
      bboxes: sectioned.block.bbox ? [sectioned.block.bbox] : [],
      table: sectioned.block.table ? { rows: sectioned.block.table.rows.map((row) => [...row]) } : undefined,
    });
  }

  /**
   * A single body block larger than the ceiling is cut at paragraph, sentence and
   * finally word boundaries. Every part keeps the block id and its part index.
   */
  private emitOversized(sectioned: SectionedBlock, chunks: Chunk[]): void {
    const parts = splitText(sectioned.text, this.config.maxChars);
    parts.forEach((part, partIndex) => {
      this.pushChunk(
        chunks,
        {
          kind: classifyChunk(sectioned.sectionPath, sectioned.clauseRef, [sectioned.block.kind]),
          text: part,
          sectionPath: sectioned.sectionPath,
          clauseRef: sectioned.clauseRef,
          clauseLevel: sectioned.clauseLevel,
          pageStart: sectioned.block.pageStart,
          pageEnd: sectioned.block.pageEnd,
          sourceBlockIds: [sectioned.block.blockId],
          bboxes: sectioned.block.bbox ? [sectioned.block.bbox] : [],
        },
        parts.length > 1 ? partIndex : undefined
      );
    });
  }

  private emitOpenChunk(open: OpenChunk, chunks: Chunk[]): void {
    const text = normalizeText(open.parts.join(PARAGRAPH_SEPARATOR));
    if (!text) return;
    this.pushChunk(chunks, {
      kind: classifyChunk(open.sectionPath, open.clauseRef, open.sourceKinds),
      text,
      sectionPath: open.sectionPath,
      clauseRef: open.clauseRef,
      clauseLevel: open.clauseLevel,
      pageStart: open.pageStart,
      pageEnd: open.pageEnd,
      sourceBlockIds: open.sourceBlockIds,
      bboxes: open.bboxes,
    });
  }

  private pushChunk(
    chunks: Chunk[],
    draft: Omit<Chunk, 'chunkId' | 'docId' | 'chunkIndex' | 'charLen' | 'tokensEst'>,
    partIndex?: number
  ): void {
    const { docId, chunkingVersion, ruleset } = this.config;
    const chunk: Chunk = {
      chunkId: generateChunkId(docId, chunkingVersion, ruleset, draft.sourceBlockIds, partIndex),
      docId,
      chunkIndex: chunks.length,
      kind: draft.kind,
      text: draft.text,
      charLen: draft.text.length,
      tokensEst: draft.text.split(/\s+/).filter(Boolean).length,
      sectionPath: [...draft.sectionPath],
      pageStart: draft.pageStart,
      pageEnd: draft.pageEnd,
      sourceBlockIds: [...draft.sourceBlockIds],
      bboxes: draft.bboxes,
    };
    if (draft.heading !== undefined) chunk.heading = draft.heading;
    if (draft.clauseRef !== undefined) chunk.clauseRef = draft.clauseRef;
    if (draft.clauseLevel !== undefined) chunk.clauseLevel = draft.clauseLevel;
    if (draft.table !== undefined) chunk.table = draft.table;
    chunks.push(chunk);
  }
}

function isSizeBoundary(reason: BoundaryReason): boolean {
  return reason === 'list_size' || reason === 'size' || reason === 'page';
}

function openChunk(sectioned: SectionedBlock, continued?: OpenChunk): OpenChunk {
  // A continuation keeps the parent clause unless the block opens a numeric clause of its own
  const inheritClause =
    continued?.clauseRef !== undefined && (sectioned.clauseRef === undefined || isLetteredClause(sectioned.clauseRef));
  const clauseRef = inheritClause ? continued?.clauseRef : sectioned.clauseRef;
  const clauseLevel = inheritClause ? continued?.clauseLevel : sectioned.clauseLevel;

  return {
    parts: [sectioned.text],
    charLen: sectioned.text.length,
    pageStart: sectioned.block.pageStart,
    pageEnd: sectioned.block.pageEnd,
    sectionPath: sectioned.sectionPath,
    ...(clauseRef !== undefined ? { clauseRef } : {}),
    ...(clauseLevel !== undefined ? { clauseLevel } : {}),
    sourceBlockIds: [sectioned.block.blockId],
    sourceKinds: [sectioned.block.kind],
    bboxes: sectioned.block.bbox ? [sectioned.block.bbox] : [],
    listItemCount: sectioned.block.kind === 'list_item' ? 1 : 0,
  };
}

function appendToChunk(open: OpenChunk, sectioned: SectionedBlock): void {
  const { block } = sectioned;
  open.parts.push(sectioned.text);
  open.charLen += PARAGRAPH_SEPARATOR.length + sectioned.text.length;
  open.pageStart = Math.min(open.pageStart, block.pageStart);
  open.pageEnd = Math.max(open.pageEnd, block.pageEnd);
  open.sourceBlockIds.push(block.blockId);
  open.sourceKinds.push(block.kind);
  if (block.bbox) open.bboxes.push(block.bbox);
  if (block.kind === 'list_item') open.listItemCount++;
  if (open.clauseRef === undefined && sectioned.clauseRef !== undefined) {
    open.clauseRef = sectioned.clauseRef;
    open.clauseLevel = sectioned.clauseLevel;
  }
}

export function classifyChunk(sectionPath: readonly string[], clauseRef: string | undefined, sourceKinds: readonly BlockKind[]): ChunkKind {
  if (sectionPath.some((heading) => DEFINITIONS_SECTION.test(heading))) return 'definition';
  if (sectionPath.some((heading) => SCHEDULE_SECTION.test(heading))) return 'schedule';
  if (clauseRef) return 'clause';
  if (sourceKinds.length > 0 && sourceKinds.every((kind) => kind === 'unknown')) return 'unknown';
  return 'paragraph';
}

/**
 * Greedy split at the coarsest boundary that keeps every part within maxChars
 */
export function splitText(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) return [text];

  const separators: Array<{ split: RegExp; join: string }> = [
    { split: /\n{2,}/, join: '\n\n' },
    { split: /(?<=[.;:!?])\s+/, join: ' ' },
    { split: /\s+/, join: ' ' },
  ];

  for (const { split, join } of separators) {
    const pieces = text.split(split).filter((piece) => piece.length > 0);
    if (pieces.length < 2) continue;

    const parts: string[] = [];
    let buffer = '';
    for (const piece of pieces) {
      const candidate = buffer ? `${buffer}${join}${piece}` : piece;
      if (candidate.length <= maxChars) {
        buffer = candidate;
        continue;
      }
      if (buffer) parts.push(buffer);
      buffer = piece;
    }
    if (buffer) parts.push(buffer);

    return parts.flatMap((part) => (part.length > maxChars ? splitText(part, maxChars) : [part]));
  }

  // No whitespace at all: hard cut
  const hardParts: string[] = [];
  for (let i = 0; i < text.length; i += maxChars) {
    hardParts.push(text.substring(i, i + maxChars));
  }
  return hardParts;
}

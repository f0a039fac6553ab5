/**
 * Parsed Document Validation Schemas
 *
 * Zod schemas for the upstream parser's block list (snake_case wire form), for
 * documents already in the camelCase contract shape, and for chunk sets read back
 * from chunks.json. Parsed input is transformed into the camelCase contract types.
 */

import { z } from 'zod';
import type { BlockKind, ChunkSet, ParsedDocument } from '../contracts/types.js';

const BLOCK_KINDS: readonly BlockKind[] = ['heading', 'paragraph', 'list_item', 'table', 'header', 'footer', 'unknown'];

function toBlockKind(value: string): BlockKind {
  const normalized = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (normalized === 'list' || normalized === 'listitem') return 'list_item';
  if (normalized === 'title' || normalized === 'section_header') return 'heading';
  if (normalized === 'page_header') return 'header';
  if (normalized === 'page_footer') return 'footer';
  if (normalized === 'text') return 'paragraph';
  return BLOCK_KINDS.find((kind) => kind === normalized) ?? 'unknown';
}

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]).transform((cell) => (cell === null ? '' : String(cell)));

const rowSchema = z
  .union([z.array(cellSchema), z.record(z.string(), cellSchema)])
  .transform((row) => (Array.isArray(row) ? row : Object.values(row)));

export const boundingBoxSchema = z.object({
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
  page: z.number().int().optional(),
});

const pageNumberSchema = z.number().int().min(1, 'page numbers start at 1');

export const parsedBlockSchema = z
  .object({
    block_id: z.string().min(1, 'block_id is required'),
    kind: z.string().transform(toBlockKind),
    text: z.string().nullish().transform((text) => text ?? ''),
    page_start: pageNumberSchema,
    page_end: pageNumberSchema.optional(),
    bbox: boundingBoxSchema.nullish(),
    table: z.object({ rows: z.array(rowSchema) }).nullish(),
  })
  .transform((block) => ({
    blockId: block.block_id,
    kind: block.kind,
    text: block.text,
    pageStart: block.page_start,
    pageEnd: block.page_end ?? block.page_start,
    ...(block.bbox ? { bbox: block.bbox } : {}),
    ...(block.table ? { table: { rows: block.table.rows } } : {}),
  }))
  .refine((block) => block.pageEnd >= block.pageStart, {
    message: 'page_end must not precede page_start',
  });

export const parsedDocumentSchema = z
  .object({
    doc_id: z.string().min(1, 'doc_id is required'),
    blocks: z.array(parsedBlockSchema).min(1, 'blocks must not be empty'),
  })
  .transform((doc): ParsedDocument => ({ docId: doc.doc_id, blocks: doc.blocks }))
  .refine((doc) => new Set(doc.blocks.map((b) => b.blockId)).size === doc.blocks.length, {
    message: 'block ids must be unique',
  });

/**
 * A document already in contract shape (library callers holding a ParsedDocument)
 */
export const parsedDocumentModelSchema: z.ZodType<ParsedDocument, z.ZodTypeDef, unknown> = z.object({
  docId: z.string().min(1, 'docId is required'),
  blocks: z.array(
    z
      .object({
        blockId: z.string().min(1, 'blockId is required'),
        kind: z.enum(['heading', 'paragraph', 'list_item', 'table', 'header', 'footer', 'unknown']),
        text: z.string(),
        pageStart: pageNumberSchema,
        pageEnd: pageNumberSchema,
        bbox: boundingBoxSchema.optional(),
        table: z.object({ rows: z.array(z.array(z.string())) }).optional(),
      })
      .refine((block) => block.pageEnd >= block.pageStart, {
        message: 'pageEnd must not precede pageStart',
      })
  ),
});

/**
 * camelCase input is recognised by its docId key; everything else is read as the wire form
 */
export function isContractShaped(input: unknown): boolean {
  return typeof input === 'object' && input !== null && 'docId' in input;
}

const evidenceRangeSchema = z.object({
  pageStart: pageNumberSchema,
  pageEnd: pageNumberSchema,
});

export const chunkSchema = evidenceRangeSchema.extend({
  chunkId: z.string().min(1),
  docId: z.string().min(1),
  chunkIndex: z.number().int().min(0),
  kind: z.enum(['heading', 'definition', 'clause', 'schedule', 'table', 'paragraph', 'unknown']),
  text: z.string(),
  charLen: z.number().int().min(0),
  tokensEst: z.number().int().min(0),
  sectionPath: z.array(z.string()),
  heading: z.string().optional(),
  clauseRef: z.string().optional(),
  clauseLevel: z.number().int().optional(),
  sourceBlockIds: z.array(z.string()).min(1),
  bboxes: z.array(boundingBoxSchema),
  table: z.object({ rows: z.array(z.array(z.string())) }).optional(),
});

export const chunkSetSchema: z.ZodType<ChunkSet, z.ZodTypeDef, unknown> = z.object({
  docId: z.string().min(1),
  chunkedAt: z.string(),
  chunking: z.object({
    version: z.string(),
    ruleset: z.string(),
    maxChars: z.number().int(),
    maxListItems: z.number().int(),
    pageRange: z.object({ start: z.number().int().optional(), end: z.number().int().optional() }).optional(),
  }),
  chunks: z.array(chunkSchema),
  excludedBlocks: z.array(
    evidenceRangeSchema.extend({
      blockId: z.string(),
      reason: z.enum(['header', 'footer', 'page_number', 'watermark']),
    })
  ),
});

export type ParsedDocumentInput = z.input<typeof parsedDocumentSchema>;

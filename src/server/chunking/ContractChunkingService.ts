/**
 * ContractChunkingService - deterministic chunking of parsed contracts
 *
 * Normalizes and sectionizes the block list, then assembles chunks with stable
 * chunkIds. The output is a pure function of (blocks, config, chunking version):
 * only `chunkedAt` differs between runs.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import type { ChunkSet, ExcludedBlock, PageRange, ParsedBlock, ParsedDocument } from '../contracts/types.js';
import { CHUNKING } from '../config/constants.js';
import { getEnv } from '../config/env.js';
import type { HeadingInferenceMode } from '../config/env.js';
import { InputDefectError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { isContractShaped, parsedDocumentModelSchema, parsedDocumentSchema } from '../validation/parsedDocumentSchemas.js';
import { ChunkAssembler } from './ChunkAssembler.js';
import { Sectionizer } from './Sectionizer.js';

/**
 * Chunking configuration. Unset fields fall back to the environment defaults.
 */
export interface ChunkingConfig {
  chunkingVersion?: string;
  ruleset?: string;
  maxChars?: number;
  maxListItems?: number;
  pageBreakFillRatio?: number;
  retainNoise?: boolean;
  headingInference?: HeadingInferenceMode;
  pageRange?: PageRange;
  now?: () => Date;
}

const chunkLogger = logger.child({ component: 'ContractChunkingService' });

export class ContractChunkingService {
  /**
   * Chunk an already-validated document
   *
   * @throws {InputDefectError} on an empty or malformed block list, or when
   * nothing chunkable remains
   */
  chunkDocument(document: ParsedDocument, config: ChunkingConfig = {}): ChunkSet {
    const env = getEnv();
    const chunkingVersion = config.chunkingVersion ?? CHUNKING.VERSION;
    const ruleset = config.ruleset ?? CHUNKING.RULESET;
    const maxChars = config.maxChars ?? env.CHUNK_MAX_CHARS;
    const maxListItems = config.maxListItems ?? env.CHUNK_MAX_LIST_ITEMS;
    const retainNoise = config.retainNoise ?? env.CHUNK_RETAIN_NOISE;

    assertWellFormed(document);

    const blocks = filterByPageRange(document.blocks, config.pageRange);
    if (blocks.length === 0) {
      throw new InputDefectError('No blocks fall inside the requested page range', {
        docId: document.docId,
        pageRange: config.pageRange,
      });
    }

    const sectionizer = new Sectionizer({
      headingInference: config.headingInference ?? env.CHUNK_HEADING_INFERENCE,
    });
    const sectioned = sectionizer.sectionize(blocks);

    const assembler = new ChunkAssembler({
      docId: document.docId,
      chunkingVersion,
      ruleset,
      maxChars,
      maxListItems,
      pageBreakFillRatio: config.pageBreakFillRatio ?? env.CHUNK_PAGE_BREAK_FILL_RATIO,
      retainNoise,
    });
    const chunks = assembler.assemble(sectioned);

    if (chunks.length === 0) {
      throw new InputDefectError('Document has no chunkable content', { docId: document.docId });
    }

    const excludedBlocks: ExcludedBlock[] = retainNoise
      ? []
      : sectioned.flatMap((entry) =>
          entry.noise
            ? [
                {
                  blockId: entry.block.blockId,
                  reason: entry.noise,
                  pageStart: entry.block.pageStart,
                  pageEnd: entry.block.pageEnd,
                },
              ]
            : []
        );

    logger.debug(
      {
        docId: document.docId,
        blockCount: blocks.length,
        chunkCount: chunks.length,
        excludedCount: excludedBlocks.length,
        chunkingVersion,
        ruleset,
      },
      'Chunked document'
    );

    return {
      docId: document.docId,
      chunkedAt: (config.now ?? (() => new Date()))().toISOString(),
      chunking: {
        version: chunkingVersion,
        ruleset,
        maxChars,
        maxListItems,
        ...(config.pageRange ? { pageRange: config.pageRange } : {}),
      },
      chunks,
      excludedBlocks,
    };
  }

  /**
   * Validate the parser's wire form (or a camelCase ParsedDocument) and chunk it
   *
   * @throws {InputDefectError} when the input fails validation
   */
  chunkInput(input: unknown, config: ChunkingConfig = {}): ChunkSet {
    const schema: ZodType<ParsedDocument, ZodTypeDef, unknown> = isContractShaped(input)
      ? parsedDocumentModelSchema
      : parsedDocumentSchema;
    const result = schema.safeParse(input);
    if (!result.success) {
      chunkLogger.warn({ issues: result.error.issues.length }, 'Rejected malformed parsed document');
      throw toInputDefect(result.error);
    }
    return this.chunkDocument(result.data, config);
  }
}

function assertWellFormed(document: ParsedDocument): void {
  if (document.blocks.length === 0) {
    throw new InputDefectError('Block list is empty', { docId: document.docId });
  }

  const seen = new Set<string>();
  for (const block of document.blocks) {
    if (seen.has(block.blockId)) {
      throw new InputDefectError(`Duplicate block id "${block.blockId}"`, { docId: document.docId });
    }
    seen.add(block.blockId);

    if (!Number.isInteger(block.pageStart) || block.pageStart < 1 || block.pageEnd < block.pageStart) {
      throw new InputDefectError(`Block "${block.blockId}" has an invalid page range`, {
        docId: document.docId,
        pageStart: block.pageStart,
        pageEnd: block.pageEnd,
      });
    }
  }
}

function filterByPageRange(blocks: readonly ParsedBlock[], range: PageRange | undefined): readonly ParsedBlock[] {
  if (!range || (range.start === undefined && range.end === undefined)) return blocks;
  const start = range.start ?? 1;
  const end = range.end ?? Number.POSITIVE_INFINITY;
  return blocks.filter((block) => block.pageEnd >= start && block.pageStart <= end);
}

function toInputDefect(error: ZodError): InputDefectError {
  const details = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return new InputDefectError(`Invalid parsed document: ${details.join('; ')}`, { issues: details });
}

const defaultService = new ContractChunkingService();

/**
 * Chunk a parsed document (validated ParsedDocument or the parser's raw JSON)
 */
export function chunk(input: unknown, config: ChunkingConfig = {}): ChunkSet {
  return defaultService.chunkInput(input, config);
}

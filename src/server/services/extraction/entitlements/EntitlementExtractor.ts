/**
 * EntitlementExtractor - tables first, prose as fallback, references always
 *
 * Every table chunk goes through the table lane. Prose candidates come from the
 * candidate selector. Per-chunk failures are logged and skipped; the evidence
 * gate runs over tables, products and references alike.
 */

import type {
  Chunk,
  ChunkSet,
  EntitlementProduct,
  EntitlementReference,
  EntitlementTable,
  EntitlementsResult,
} from '../../../contracts/types.js';
import { PatternParseError, isAppError } from '../../../types/errors.js';
import { logger } from '../../../utils/logger.js';
import { CandidateSelector } from '../candidates/CandidateSelector.js';
import { ENTITLEMENTS_CONCEPT } from '../candidates/concepts.js';
import { EvidenceGate } from '../EvidenceGate.js';
import { buildStats, extractedAt, pipelineVersion } from '../extractionOptions.js';
import type { ExtractionOptions } from '../extractionOptions.js';
import { ProseExtractor } from './ProseExtractor.js';
import { ReferenceExtractor } from './ReferenceExtractor.js';
import { TableExtractor } from './TableExtractor.js';

const entitlementLogger = logger.child({ component: 'EntitlementExtractor' });

function productKey(product: EntitlementProduct): string {
  return `${product.name.toLowerCase()}|${product.metric ?? ''}|${product.quantity ?? ''}`;
}

export class EntitlementExtractor {
  constructor(
    private readonly tableExtractor: TableExtractor = new TableExtractor(),
    private readonly proseExtractor: ProseExtractor = new ProseExtractor(),
    private readonly referenceExtractor: ReferenceExtractor = new ReferenceExtractor()
  ) {}

  async extract(chunkSet: ChunkSet, options: ExtractionOptions = {}): Promise<EntitlementsResult> {
    let skippedChunks = 0;
    const guarded = <T>(chunk: Chunk, fn: () => T[]): T[] => {
      try {
        return fn();
      } catch (error) {
        skippedChunks++;
        const parseError = isAppError(error)
          ? error
          : new PatternParseError(error instanceof Error ? error.message : String(error), { chunkId: chunk.chunkId });
        entitlementLogger.warn({ chunkId: chunk.chunkId, code: parseError.code }, `Skipped chunk: ${parseError.message}`);
        return [];
      }
    };

    const tables: EntitlementTable[] = [];
    const products: EntitlementProduct[] = [];
    for (const chunk of chunkSet.chunks) {
      if (chunk.kind !== 'table' && !chunk.table) continue;
      for (const extraction of guarded(chunk, () => {
        const result = this.tableExtractor.extract(chunk);
        return result ? [result] : [];
      })) {
        tables.push(extraction.table);
        products.push(...extraction.products);
      }
    }

    const selection = await new CandidateSelector(options).select(chunkSet, ENTITLEMENTS_CONCEPT);
    const seen = new Set(products.map(productKey));
    for (const candidate of selection.candidates) {
      for (const product of guarded(candidate.chunk, () => this.proseExtractor.extract(candidate.chunk))) {
        const key = productKey(product);
        if (seen.has(key)) continue;
        seen.add(key);
        products.push(product);
      }
    }

    const references: EntitlementReference[] = [];
    for (const chunk of chunkSet.chunks) {
      references.push(...guarded(chunk, () => this.referenceExtractor.extract(chunk)));
    }

    const gate = new EvidenceGate(chunkSet.chunks);
    const gatedTables = gate.filter(tables);
    const gatedProducts = gate.filter(products);
    const gatedReferences = gate.filter(references);
    const dropped = gatedTables.dropped + gatedProducts.dropped + gatedReferences.dropped;

    entitlementLogger.debug(
      {
        docId: chunkSet.docId,
        tables: gatedTables.kept.length,
        products: gatedProducts.kept.length,
        references: gatedReferences.kept.length,
        dropped,
      },
      'Extracted entitlements'
    );

    return {
      docId: chunkSet.docId,
      extractedAt: extractedAt(options),
      pipeline: pipelineVersion(),
      entitlements: {
        status: gatedProducts.kept.length > 0 ? 'OK' : 'NO_ENTITLEMENTS_FOUND_IN_DOCUMENT',
        tables: gatedTables.kept,
        products: gatedProducts.kept,
        references: gatedReferences.kept,
      },
      stats: buildStats(selection, skippedChunks, dropped),
      warnings: [...selection.warnings],
    };
  }
}

const defaultExtractor = new EntitlementExtractor();

export function extractEntitlements(chunkSet: ChunkSet, options: ExtractionOptions = {}): Promise<EntitlementsResult> {
  return defaultExtractor.extract(chunkSet, options);
}

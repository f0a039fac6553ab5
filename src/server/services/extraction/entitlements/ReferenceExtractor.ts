/**
 * ReferenceExtractor - pointers to documents that hold the entitlements
 *
 * Captured on every run so a result without products still says where the
 * entitlements live. At most one reference per chunk and type.
 */

import type { Chunk, EntitlementReference, ReferenceType } from '../../../contracts/types.js';
import { SNIPPET } from '../../../config/constants.js';
import { makeSnippet } from '../../../utils/textNormalization.js';
import { hasEntitlementVocabulary, splitSentences } from './ProseExtractor.js';

const REFERENCE_PATTERNS: ReadonlyArray<{ refType: ReferenceType; patterns: RegExp[] }> = [
  { refType: 'order_form', patterns: [/\border forms?\b/i] },
  { refType: 'ordering_document', patterns: [/\bordering documents?\b/i] },
  { refType: 'sow', patterns: [/\bstatements? of work\b/i, /\bSOWs?\b/] },
  { refType: 'msa', patterns: [/\bmaster (?:services |subscription |licen[cs]e )?agreement\b/i, /\bMSA\b/] },
  { refType: 'support_schedule', patterns: [/\bsupport (?:schedule|polic(?:y|ies))\b/i] },
];

export class ReferenceExtractor {
  extract(chunk: Chunk): EntitlementReference[] {
    if (chunk.kind === 'table' || chunk.kind === 'heading') return [];

    const sentences = splitSentences(chunk.text);
    const references: EntitlementReference[] = [];

    for (const { refType, patterns } of REFERENCE_PATTERNS) {
      for (const sentence of sentences) {
        const match = patterns.map((pattern) => pattern.exec(sentence)).find((m) => m !== null);
        if (!match) continue;

        references.push({
          refType,
          refText: sentence.length > SNIPPET.MAX_LENGTH ? `${sentence.substring(0, SNIPPET.MAX_LENGTH)}…` : sentence,
          confidence: hasEntitlementVocabulary(sentence) ? 0.8 : 0.6,
          evidence: [
            {
              chunkId: chunk.chunkId,
              pageStart: chunk.pageStart,
              pageEnd: chunk.pageEnd,
              ...(chunk.clauseRef ? { clauseRef: chunk.clauseRef } : {}),
              snippet: makeSnippet(chunk.text, match[0]),
            },
          ],
        });
        break;
      }
    }

    return references;
  }
}

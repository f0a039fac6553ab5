/**
 * ProseExtractor - entitlement products stated in running text
 *
 * Works sentence by sentence on non-table chunks that carry licensing
 * vocabulary. A product is emitted only with a name and at least one of metric
 * or quantity; nothing is synthesized from partial matches.
 */

import type { Chunk, EntitlementProduct } from '../../../contracts/types.js';
import { collapseWhitespace, makeSnippet } from '../../../utils/textNormalization.js';
import { DEFINING_VERB, ENTITLEMENT_INDICATORS, isDefinitionsSection } from '../candidates/concepts.js';
import { scoreProseProduct } from '../scoring/ConfidenceScorer.js';
import { canonicalMetric, isMetricPhrase } from './metrics.js';
import { TermParser } from './TermParser.js';

const TITLE_RUN = "[A-Z][A-Za-z0-9+&.'-]*(?:\\s+(?:[A-Z][A-Za-z0-9+&.'-]*|\\d+[A-Za-z]*))*";
const VENDOR_NAME = new RegExp(
  `\\b((?:Oracle|Microsoft|SAP|IBM|Adobe|Salesforce|VMware|Red Hat)(?:\\s+(?:[A-Z][A-Za-z0-9+&.'-]*|\\d+[A-Za-z]*)){0,5})`
);
const LICENCE_VERB_NAME = new RegExp(`\\blicen[cs](?:ed|es|e)\\s+(?:to\\s+use\\s+)?(?:the\\s+)?(${TITLE_RUN})`);
const TITLE_RUNS = new RegExp(TITLE_RUN, 'g');
const QUANTITY_UNIT =
  /\b(\d{1,3}(?:,\d{3})+|\d+)\s*(?:\(\s*\d+\s*\)\s*)?(named users?\s+plus|named users?|processors?|cpus?|cores?|users?|employees?|seats?|devices?|instances?|servers?|licen[cs]es?)\b/i;
const AMBIGUOUS_PRONOUN = /\b(?:it|they|them|such (?:software|products?|programs?|services?)|the same)\b/i;
const SENTENCE_BREAK = /(?<=[.;!?])\s+|\n+/;

/** Capitalized words that open sentences or name parties and documents, not products */
const NAME_STOPWORDS = new Set([
  'A', 'An', 'The', 'This', 'That', 'These', 'Those', 'Each', 'Any', 'All', 'Such', 'In', 'For', 'Under', 'Subject',
  'Within', 'Upon', 'On', 'At', 'By', 'To', 'From', 'Of', 'With', 'Without', 'During', 'After', 'Before', 'Up',
  'Customer', 'Licensee', 'Licensor', 'Supplier', 'Vendor', 'Party', 'Parties', 'Agreement', 'Order', 'Form',
  'Ordering', 'Document', 'Schedule', 'Appendix', 'Annex', 'Exhibit', 'Section', 'Clause', 'Effective', 'Date',
  'Term', 'Territory', 'Licence', 'License', 'Licensed', 'Programs', 'Products', 'Services', 'Software',
]);

export interface ProseProductName {
  name: string;
  strong: boolean;
}

export function hasEntitlementVocabulary(text: string): boolean {
  return ENTITLEMENT_INDICATORS.some((indicator) => indicator.test(text));
}

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BREAK)
    .map((sentence) => collapseWhitespace(sentence))
    .filter((sentence) => sentence.length > 0);
}

function cleanName(name: string): string {
  return name.replace(/[.,;:]+$/, '').trim();
}

/**
 * Vendor prefix or licence-verb phrase (strong), else the first Title-Case run
 * that survives the stopword filter (weak)
 */
export function findProductName(sentence: string): ProseProductName | null {
  const vendor = VENDOR_NAME.exec(sentence);
  if (vendor) return { name: cleanName(vendor[1]), strong: true };

  const licensed = LICENCE_VERB_NAME.exec(sentence);
  if (licensed) {
    const name = stripStopwords(licensed[1]);
    if (name) return { name, strong: true };
  }

  for (const match of sentence.matchAll(TITLE_RUNS)) {
    const name = stripStopwords(match[0]);
    if (name) return { name, strong: false };
  }
  return null;
}

function stripStopwords(run: string): string {
  const words = cleanName(run).split(/\s+/);
  const kept = words.filter((word) => !NAME_STOPWORDS.has(word.replace(/[.,;:]+$/, '')));
  // Leading numbers are quantities, not part of a name
  while (kept.length > 0 && /^\d/.test(kept[0])) kept.shift();
  if (kept.length === 0) return '';
  const name = cleanName(kept.join(' '));
  if (isMetricPhrase(name)) return '';
  return name.length >= 3 ? name : '';
}

export class ProseExtractor {
  constructor(private readonly termParser: TermParser = new TermParser()) {}

  extract(chunk: Chunk): EntitlementProduct[] {
    if (chunk.kind === 'definition' || isDefinitionsSection(chunk.sectionPath)) return [];
    if (!hasEntitlementVocabulary(chunk.text)) return [];

    const products: EntitlementProduct[] = [];
    for (const sentence of splitSentences(chunk.text)) {
      const product = this.fromSentence(sentence, chunk);
      if (product) products.push(product);
    }
    return products;
  }

  private fromSentence(sentence: string, chunk: Chunk): EntitlementProduct | null {
    if (DEFINING_VERB.test(sentence)) return null;
    const name = findProductName(sentence);
    if (!name) return null;

    const quantityMatch = QUANTITY_UNIT.exec(sentence);
    const quantity = quantityMatch ? Number(quantityMatch[1].replace(/,/g, '')) : null;
    const metric = canonicalMetric(sentence);
    if (metric === null && quantity === null) return null;

    const unit = (quantityMatch ? canonicalMetric(quantityMatch[2]) : null) ?? metric;
    const term = this.termParser.hasTermSignal(sentence) ? this.termParser.parse(sentence) : null;

    return {
      name: name.name,
      metric,
      quantity,
      unit,
      term,
      territory: null,
      restrictions: [],
      source: 'prose',
      confidence: scoreProseProduct({
        strongName: name.strong,
        hasMetric: metric !== null,
        hasQuantity: quantity !== null,
        ambiguousPronoun: AMBIGUOUS_PRONOUN.test(sentence),
      }),
      evidence: [
        {
          chunkId: chunk.chunkId,
          pageStart: chunk.pageStart,
          pageEnd: chunk.pageEnd,
          ...(chunk.clauseRef ? { clauseRef: chunk.clauseRef } : {}),
          snippet: makeSnippet(chunk.text, name.name),
        },
      ],
    };
  }
}

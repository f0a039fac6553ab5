/**
 * DefinitionExtractor - defined terms with evidence
 *
 * Candidate chunks are split into line units and run through the ordered
 * matchers. A matched definition that ends mid-thought absorbs following units
 * until a stop condition, within the merge limits. Raw records are resolved in
 * document order and gated on evidence.
 */

import type { Chunk, ChunkSet, DefinitionsResult, Evidence } from '../../../contracts/types.js';
import { DEFINITION_LIMITS, DEFINITION_MERGE } from '../../../config/constants.js';
import { extractClauseReference, startsWithNumericClause } from '../../../chunking/clauseReferences.js';
import { PatternParseError, isAppError } from '../../../types/errors.js';
import { logger } from '../../../utils/logger.js';
import { collapseWhitespace, makeSnippet, stripQuotes } from '../../../utils/textNormalization.js';
import { CandidateSelector } from '../candidates/CandidateSelector.js';
import { DEFINITIONS_CONCEPT, isDefinitionsSection } from '../candidates/concepts.js';
import { EvidenceGate } from '../EvidenceGate.js';
import { buildStats, extractedAt, pipelineVersion } from '../extractionOptions.js';
import type { ExtractionOptions } from '../extractionOptions.js';
import { scoreDefinition } from '../scoring/ConfidenceScorer.js';
import { DefinitionResolver } from '../scoring/DefinitionResolver.js';
import type { RawDefinition } from '../scoring/DefinitionResolver.js';
import { DEFAULT_MATCHERS, startsNewTerm } from './DefinitionMatchers.js';
import type { DefinitionMatch, DefinitionMatcher } from './DefinitionMatchers.js';

const AVOIDANCE_OF_DOUBT = /^for the avoidance of doubt\b/i;
const LEADING_PUNCTUATION = /^[\s:,;.\-–—]+/;

const definitionLogger = logger.child({ component: 'DefinitionExtractor' });

export function splitUnits(text: string): string[] {
  return text
    .split(/\n+/)
    .map((unit) => unit.trim())
    .filter((unit) => unit.length > 0);
}

/**
 * A trailing comma, a dangling conjunction, or no terminal punctuation at all
 */
export function hasContinuationSignal(definition: string): boolean {
  const t = definition.trim();
  if (!t) return true;
  if (t.endsWith(',')) return true;
  if (/\b(?:and|or|including)$/i.test(t)) return true;
  return !/[.;!?]["”’')\]]*$/.test(t);
}

function stopsMerge(unit: string): boolean {
  return AVOIDANCE_OF_DOUBT.test(unit) || startsWithNumericClause(unit) || startsNewTerm(unit);
}

function isMostlyNumeric(term: string): boolean {
  const chars = term.replace(/\s/g, '');
  if (chars.length === 0) return true;
  const digits = (chars.match(/\d/g) ?? []).length;
  return digits / chars.length > 0.5 || !/[A-Za-z]/.test(chars);
}

export class DefinitionExtractor {
  constructor(
    private readonly matchers: readonly DefinitionMatcher[] = DEFAULT_MATCHERS,
    private readonly resolver: DefinitionResolver = new DefinitionResolver()
  ) {}

  async extract(chunkSet: ChunkSet, options: ExtractionOptions = {}): Promise<DefinitionsResult> {
    const selection = await new CandidateSelector(options).select(chunkSet, DEFINITIONS_CONCEPT);

    const raw: RawDefinition[] = [];
    let skippedChunks = 0;
    for (const candidate of selection.candidates) {
      try {
        for (const item of this.extractFromChunk(candidate.chunk)) {
          raw.push({ ...item, order: raw.length });
        }
      } catch (error) {
        skippedChunks++;
        const parseError = isAppError(error)
          ? error
          : new PatternParseError(error instanceof Error ? error.message : String(error), { chunkId: candidate.chunkId });
        definitionLogger.warn({ chunkId: candidate.chunkId, code: parseError.code }, `Skipped chunk: ${parseError.message}`);
      }
    }

    const resolved = this.resolver.resolve(raw);
    const gated = new EvidenceGate(chunkSet.chunks).filter(resolved);

    definitionLogger.debug(
      { docId: chunkSet.docId, raw: raw.length, definitions: gated.kept.length, dropped: gated.dropped },
      'Extracted definitions'
    );

    return {
      docId: chunkSet.docId,
      extractedAt: extractedAt(options),
      pipeline: pipelineVersion(),
      definitions: gated.kept,
      stats: buildStats(selection, skippedChunks, gated.dropped),
      warnings: [...selection.warnings],
    };
  }

  /**
   * Raw definitions found in one chunk, in text order (order is assigned by the caller)
   */
  extractFromChunk(chunk: Chunk): Array<Omit<RawDefinition, 'order'>> {
    const units = splitUnits(chunk.text);
    const inDefinitionsSection = chunk.kind === 'definition' || isDefinitionsSection(chunk.sectionPath);
    const results: Array<Omit<RawDefinition, 'order'>> = [];

    let i = 0;
    while (i < units.length) {
      const unit = units[i];
      const matches = this.firstMatch(unit);
      if (!matches) {
        i++;
        continue;
      }

      let consumed = 1;
      if (matches.length === 1 && matches[0].pattern !== 'semicolon_run') {
        const merged = this.mergeContinuation(matches[0].definition, units, i + 1);
        matches[0] = { ...matches[0], definition: merged.definition };
        consumed += merged.consumed;
      }

      for (const match of matches) {
        const record = this.buildRecord(match, unit, chunk, inDefinitionsSection);
        if (record) results.push(record);
      }
      i += consumed;
    }

    return results;
  }

  private firstMatch(unit: string): DefinitionMatch[] | null {
    for (const matcher of this.matchers) {
      const matches = matcher.attempt(unit);
      if (matches && matches.length > 0) return matches;
    }
    return null;
  }

  private mergeContinuation(definition: string, units: readonly string[], start: number): { definition: string; consumed: number } {
    let merged = definition.trim();
    let consumed = 0;
    let next = start;

    while (
      hasContinuationSignal(merged) &&
      next < units.length &&
      consumed + 1 < DEFINITION_MERGE.MAX_PARAGRAPHS &&
      !stopsMerge(units[next])
    ) {
      const candidate = merged ? `${merged} ${units[next]}` : units[next];
      if (candidate.length > DEFINITION_MERGE.MAX_CHARS) break;
      merged = candidate;
      consumed++;
      next++;
    }

    return { definition: merged, consumed };
  }

  private buildRecord(
    match: DefinitionMatch,
    unit: string,
    chunk: Chunk,
    inDefinitionsSection: boolean
  ): Omit<RawDefinition, 'order'> | null {
    if (match.term.includes('\n')) return null;
    const term = collapseWhitespace(stripQuotes(match.term));
    if (!term || term.length > DEFINITION_LIMITS.MAX_TERM_LENGTH || isMostlyNumeric(term)) return null;

    const definition = collapseWhitespace(match.definition).replace(LEADING_PUNCTUATION, '');
    if (!definition) return null;

    const clauseRef = extractClauseReference(unit)?.clauseRef ?? chunk.clauseRef;
    const evidence: Evidence = {
      chunkId: chunk.chunkId,
      pageStart: chunk.pageStart,
      pageEnd: chunk.pageEnd,
      ...(clauseRef ? { clauseRef } : {}),
      snippet: makeSnippet(chunk.text, term),
    };

    return {
      inDefinitionsSection,
      record: {
        term,
        definition,
        location: { sectionPath: [...chunk.sectionPath], ...(clauseRef ? { clauseRef } : {}) },
        confidence: scoreDefinition({
          inDefinitionsSection,
          pattern: match.pattern,
          hasClauseRef: clauseRef !== undefined,
          termLength: term.length,
          definitionLength: definition.length,
        }),
        evidence: [evidence],
        conflict: false,
        pattern: match.pattern,
        lowConfidence: definition.length < DEFINITION_LIMITS.SHORT_DEFINITION_LENGTH,
      },
    };
  }
}

const defaultExtractor = new DefinitionExtractor();

export function extractDefinitions(chunkSet: ChunkSet, options: ExtractionOptions = {}): Promise<DefinitionsResult> {
  return defaultExtractor.extract(chunkSet, options);
}

import type { ExtractionStats, PipelineVersion } from '../../contracts/types.js';
import { EXTRACTION } from '../../config/constants.js';
import type { CandidateSelection, CandidateSelectorOptions } from './candidates/CandidateSelector.js';

/**
 * Options shared by the definition and entitlement extractors
 */
export interface ExtractionOptions extends CandidateSelectorOptions {
  /** Clock for `extractedAt`; fixed in tests */
  now?: () => Date;
}

export function pipelineVersion(): PipelineVersion {
  return { pipelineVersion: EXTRACTION.PIPELINE_VERSION, rulesetVersion: EXTRACTION.RULESET_VERSION };
}

export function buildStats(selection: CandidateSelection, skippedChunks: number, droppedForEvidence: number): ExtractionStats {
  return {
    candidates: selection.candidates.length,
    candidatesByReason: { ...selection.byReason },
    candidatesTruncated: selection.truncated,
    skippedChunks,
    droppedForEvidence,
  };
}

export function extractedAt(options: ExtractionOptions): string {
  return (options.now ?? (() => new Date()))().toISOString();
}

/**
 * Candidate concepts: what makes a chunk worth running an extractor over
 */

import type { ChunkKind } from '../../../contracts/types.js';

export interface CandidateConcept {
  name: string;
  /** Matched as whole words against every heading in the chunk's section path */
  sectionKeywords: readonly string[];
  /** Whole-text indicators for the pattern-scan lane */
  patternIndicators: readonly RegExp[];
  /** Queries sent to the search collaborator when the first two lanes come up short */
  fallbackQueries: readonly string[];
  excludedKinds: readonly ChunkKind[];
}

export const DEFINING_VERB = /\b(?:means|shall mean|has the meaning|is defined as)\b/i;

export const DEFINITIONS_CONCEPT: CandidateConcept = {
  name: 'definitions',
  sectionKeywords: ['definitions', 'definition', 'interpretation', 'defined terms'],
  patternIndicators: [DEFINING_VERB],
  fallbackQueries: ['means', 'shall mean', 'has the meaning given', 'defined terms'],
  excludedKinds: ['heading', 'table'],
};

/**
 * Licensing vocabulary used by both candidate scanning and the prose gate
 */
export const ENTITLEMENT_INDICATORS: readonly RegExp[] = [
  /\blicen[cs]ed\b[\s\S]*\b(?:products?|services?|programs?)\b/i,
  /\b(?:products?|services?|programs?)\b[\s\S]*\blicen[cs]ed\b/i,
  /\bentitle(?:d|ment|ments)\b/i,
  /\bsubscription\b[\s\S]*\b(?:term|period)\b/i,
  /\b(?:processors?|cores?|named users?|users?|employees?|seats?)\b/i,
];

export const ENTITLEMENTS_CONCEPT: CandidateConcept = {
  name: 'entitlements',
  sectionKeywords: ['licensed programs', 'entitlements', 'licence grant', 'license grant', 'order form', 'ordering document'],
  patternIndicators: ENTITLEMENT_INDICATORS,
  fallbackQueries: ['licensed programs', 'license metric quantity', 'entitlement', 'subscription term'],
  excludedKinds: ['heading', 'table'],
};

const DEFINITIONS_SECTION = /\b(?:definitions?|interpretation|defined terms)\b/i;

export function isDefinitionsSection(sectionPath: readonly string[]): boolean {
  return sectionPath.some((heading) => DEFINITIONS_SECTION.test(heading));
}

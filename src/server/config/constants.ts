/**
 * Pipeline constants
 *
 * Version strings are written into every chunk set and extraction result so that
 * historical outputs stay interpretable after rule changes.
 */

/**
 * Chunking version and ruleset. Changing either changes every chunkId.
 */
export const CHUNKING = {
  VERSION: 'v1',
  RULESET: '2026-01',
} as const;

/**
 * Extraction pipeline and ruleset versions
 */
export const EXTRACTION = {
  PIPELINE_VERSION: 'v1',
  RULESET_VERSION: '2026-01',
} as const;

/**
 * Definition merge limits
 */
export const DEFINITION_MERGE = {
  MAX_PARAGRAPHS: 3,
  MAX_CHARS: 1200,
} as const;

/**
 * Term / definition acceptance thresholds
 */
export const DEFINITION_LIMITS = {
  MAX_TERM_LENGTH: 80,
  LONG_TERM_LENGTH: 60,
  SHORT_DEFINITION_LENGTH: 10,
  GOOD_DEFINITION_MIN: 30,
  GOOD_DEFINITION_MAX: 500,
} as const;

/**
 * Snippet sizing for evidence pointers
 */
export const SNIPPET = {
  MAX_LENGTH: 240,
  LEAD_CHARS: 80,
  TRAIL_CHARS: 200,
} as const;

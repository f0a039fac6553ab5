/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults.
 * Values are validated once and cached; tests call resetEnv() after changing process.env.
 */

// Load dotenv early to ensure environment variables are available on first getEnv()
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

export type HeadingInferenceMode = 'auto' | 'always' | 'never';

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: 'development' | 'production' | 'test';

  // Logging Configuration
  LOG_LEVEL?: string;
  LOG_PRETTY?: string;

  // Chunking Configuration
  CHUNK_MAX_CHARS: number;
  CHUNK_MAX_LIST_ITEMS: number;
  CHUNK_PAGE_BREAK_FILL_RATIO: number;
  CHUNK_RETAIN_NOISE: boolean;
  CHUNK_HEADING_INFERENCE: HeadingInferenceMode;

  // Candidate Selection Configuration
  CANDIDATE_CAP: number;
  CANDIDATE_SMALL_DOC_CHUNKS: number;
  CANDIDATE_COVERAGE_THRESHOLD: number;
  SEARCH_FALLBACK_TOP_N: number;
  SEARCH_TIMEOUT_MS: number;

  // Batch Configuration
  EXTRACTION_CONCURRENCY: number;
}

let validatedEnv: Env | null = null;

function isNodeEnv(value: string): value is Env['NODE_ENV'] {
  return value === 'development' || value === 'production' || value === 'test';
}

function isHeadingInferenceMode(value: string): value is HeadingInferenceMode {
  return value === 'auto' || value === 'always' || value === 'never';
}

/**
 * Validate and return environment variables
 * @throws {Error} If validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const maxChars = parseNumericEnv(process.env.CHUNK_MAX_CHARS, 2000);
  if (maxChars < 200) {
    errors.push(`CHUNK_MAX_CHARS: Invalid value "${process.env.CHUNK_MAX_CHARS}". Must be at least 200.`);
  }

  const maxListItems = parseNumericEnv(process.env.CHUNK_MAX_LIST_ITEMS, 12);
  if (maxListItems < 1) {
    errors.push(`CHUNK_MAX_LIST_ITEMS: Invalid value "${process.env.CHUNK_MAX_LIST_ITEMS}". Must be at least 1.`);
  }

  const fillRatio = parseFloatEnv(process.env.CHUNK_PAGE_BREAK_FILL_RATIO, 0.75);
  if (fillRatio <= 0 || fillRatio > 1) {
    errors.push(`CHUNK_PAGE_BREAK_FILL_RATIO: Invalid value "${process.env.CHUNK_PAGE_BREAK_FILL_RATIO}". Must be in (0, 1].`);
  }

  const headingInference = process.env.CHUNK_HEADING_INFERENCE || 'auto';
  if (!isHeadingInferenceMode(headingInference)) {
    errors.push(`CHUNK_HEADING_INFERENCE: Invalid value "${headingInference}". Must be auto, always, or never.`);
  }

  const candidateCap = parseNumericEnv(process.env.CANDIDATE_CAP, 250);
  if (candidateCap < 1) {
    errors.push(`CANDIDATE_CAP: Invalid value "${process.env.CANDIDATE_CAP}". Must be at least 1.`);
  }

  const searchTimeoutMs = parseNumericEnv(process.env.SEARCH_TIMEOUT_MS, 2000);
  if (searchTimeoutMs < 1) {
    errors.push(`SEARCH_TIMEOUT_MS: Invalid value "${process.env.SEARCH_TIMEOUT_MS}". Must be positive.`);
  }

  const concurrency = parseNumericEnv(process.env.EXTRACTION_CONCURRENCY, 4);
  if (concurrency < 1) {
    errors.push(`EXTRACTION_CONCURRENCY: Invalid value "${process.env.EXTRACTION_CONCURRENCY}". Must be at least 1.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv) || !isHeadingInferenceMode(headingInference)) {
    throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,

    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_PRETTY: process.env.LOG_PRETTY,

    CHUNK_MAX_CHARS: maxChars,
    CHUNK_MAX_LIST_ITEMS: maxListItems,
    CHUNK_PAGE_BREAK_FILL_RATIO: fillRatio,
    CHUNK_RETAIN_NOISE: parseBooleanEnv(process.env.CHUNK_RETAIN_NOISE, false),
    CHUNK_HEADING_INFERENCE: headingInference,

    CANDIDATE_CAP: candidateCap,
    CANDIDATE_SMALL_DOC_CHUNKS: parseNumericEnv(process.env.CANDIDATE_SMALL_DOC_CHUNKS, 300),
    CANDIDATE_COVERAGE_THRESHOLD: parseNumericEnv(process.env.CANDIDATE_COVERAGE_THRESHOLD, 5),
    SEARCH_FALLBACK_TOP_N: parseNumericEnv(process.env.SEARCH_FALLBACK_TOP_N, 10),
    SEARCH_TIMEOUT_MS: searchTimeoutMs,

    EXTRACTION_CONCURRENCY: concurrency,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

/**
 * Contract evidence engine
 *
 * Chunks parsed contracts into stable, page-anchored chunks and extracts
 * evidence-linked definitions and entitlements from them.
 */

export * from './contracts/index.js';

export { chunk, ContractChunkingService } from './chunking/ContractChunkingService.js';
export type { ChunkingConfig } from './chunking/ContractChunkingService.js';
export { renderChunkDebugMarkdown } from './chunking/chunkDebugReport.js';

export { extractDefinitions, DefinitionExtractor } from './services/extraction/definitions/DefinitionExtractor.js';
export { extractEntitlements, EntitlementExtractor } from './services/extraction/entitlements/EntitlementExtractor.js';
export type { ExtractionOptions } from './services/extraction/extractionOptions.js';
export { EvidenceGate } from './services/extraction/EvidenceGate.js';

export { KeywordSearchService, keywordScore, tokenize } from './services/search/index.js';
export { ReviewPackExporter } from './services/export/ReviewPackExporter.js';

export {
  AppError,
  InputDefectError,
  PatternParseError,
  ExternalServiceError,
  RequestTimeoutError,
  ErrorCode,
  isAppError,
} from './types/errors.js';
export { getEnv, resetEnv } from './config/env.js';
export { logger } from './utils/logger.js';

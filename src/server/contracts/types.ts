/**
 * Contract Types
 *
 * TypeScript types for parsed contracts, chunk sets and evidence-linked extractions.
 * Every extracted record carries at least one Evidence pointer back to a chunk and
 * its page range.
 */

/**
 * Block kind as classified by the upstream document parser
 */
export type BlockKind = 'heading' | 'paragraph' | 'list_item' | 'table' | 'header' | 'footer' | 'unknown';

/**
 * Spatial box of a block on its page (parser coordinates)
 */
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  page?: number;
}

/**
 * Raw table payload attached to a table block
 */
export interface TableData {
  rows: string[][];
}

/**
 * Immutable unit produced by the upstream parser
 */
export interface ParsedBlock {
  readonly blockId: string;
  readonly kind: BlockKind;
  readonly text: string;
  readonly pageStart: number;
  readonly pageEnd: number;
  readonly bbox?: BoundingBox;
  readonly table?: TableData;
}

/**
 * Ordered block list for one document
 */
export interface ParsedDocument {
  docId: string;
  blocks: ParsedBlock[];
}

/**
 * Heading stack entry
 */
export interface SectionFrame {
  headingText: string;
  level: number;
}

/**
 * Why a block was kept out of chunk formation
 */
export type NoiseReason = 'header' | 'footer' | 'page_number' | 'watermark';

/**
 * Block annotated by the Sectionizer
 */
export interface SectionedBlock {
  block: ParsedBlock;
  /** Normalized block text (tables: serialized rows when available) */
  text: string;
  sectionPath: string[];
  clauseRef?: string;
  clauseLevel?: number;
  isHeading: boolean;
  headingLevel?: number;
  noise?: NoiseReason;
}

/**
 * Chunk kind
 */
export type ChunkKind = 'heading' | 'definition' | 'clause' | 'schedule' | 'table' | 'paragraph' | 'unknown';

/**
 * Retrieval / extraction unit derived from one or more source blocks
 */
export interface Chunk {
  chunkId: string; // {docId}:{chunkingVersion}:{sha256(...)[0:16]}
  docId: string;
  chunkIndex: number;
  kind: ChunkKind;
  text: string;
  charLen: number;
  tokensEst: number;
  sectionPath: string[];
  heading?: string;
  clauseRef?: string;
  clauseLevel?: number;
  pageStart: number;
  pageEnd: number;
  sourceBlockIds: string[];
  bboxes: BoundingBox[];
  table?: TableData;
}

export interface ExcludedBlock {
  blockId: string;
  reason: NoiseReason;
  pageStart: number;
  pageEnd: number;
}

export interface PageRange {
  start?: number;
  end?: number;
}

/**
 * Output of chunking for one document
 */
export interface ChunkSet {
  docId: string;
  chunkedAt: string;
  chunking: {
    version: string;
    ruleset: string;
    maxChars: number;
    maxListItems: number;
    pageRange?: PageRange;
  };
  chunks: Chunk[];
  excludedBlocks: ExcludedBlock[];
}

/**
 * Source pointer attached to every extracted record
 */
export interface Evidence {
  chunkId: string;
  pageStart: number;
  pageEnd: number;
  clauseRef?: string;
  snippet: string;
}

/**
 * Why a chunk was selected for extraction, strongest first
 */
export type CandidateReason = 'section_match' | 'pattern_match' | 'search_fallback';

export interface Candidate {
  chunkId: string;
  reason: CandidateReason;
  chunk: Chunk;
}

/**
 * Which definition matcher produced a record
 */
export type DefinitionPattern = 'quoted' | 'unquoted' | 'colon' | 'semicolon_run';

export interface DefinitionLocation {
  sectionPath: string[];
  clauseRef?: string;
}

export interface DefinitionRecord {
  term: string;
  definition: string;
  location: DefinitionLocation;
  confidence: number;
  evidence: Evidence[];
  conflict: boolean;
  pattern: DefinitionPattern;
  lowConfidence: boolean;
}

export type TableType = 'licensed_programs' | 'pricing' | 'support' | 'unknown';

/**
 * Canonical table column names
 */
export type CanonicalColumn =
  | 'product'
  | 'metric'
  | 'quantity'
  | 'term'
  | 'territory'
  | 'restrictions'
  | 'sku'
  | 'csi'
  | 'price';

export interface EntitlementTable {
  title: string | null;
  tableType: TableType;
  headers: string[];
  rows: Array<Record<string, string>>;
  confidence: number;
  evidence: Evidence[];
}

export interface EntitlementTerm {
  start?: string; // ISO date
  end?: string; // ISO date
  duration?: string; // e.g. "36 months"
  raw?: string;
}

export type ProductSource = 'table' | 'prose';

export interface EntitlementProduct {
  name: string;
  metric: string | null;
  quantity: number | string | null;
  unit: string | null;
  term: EntitlementTerm | null;
  territory: string | null;
  restrictions: string[];
  source: ProductSource;
  confidence: number;
  evidence: Evidence[];
}

export type ReferenceType = 'order_form' | 'ordering_document' | 'sow' | 'msa' | 'support_schedule';

export interface EntitlementReference {
  refType: ReferenceType;
  refText: string;
  confidence: number;
  evidence: Evidence[];
}

export type EntitlementStatus = 'OK' | 'NO_ENTITLEMENTS_FOUND_IN_DOCUMENT';

export interface PipelineVersion {
  pipelineVersion: string;
  rulesetVersion: string;
}

export interface ExtractionStats {
  candidates: number;
  candidatesByReason: Record<CandidateReason, number>;
  candidatesTruncated: boolean;
  skippedChunks: number;
  droppedForEvidence: number;
}

export interface DefinitionsResult {
  docId: string;
  extractedAt: string;
  pipeline: PipelineVersion;
  definitions: DefinitionRecord[];
  stats: ExtractionStats;
  warnings: string[];
}

export interface EntitlementsResult {
  docId: string;
  extractedAt: string;
  pipeline: PipelineVersion;
  entitlements: {
    status: EntitlementStatus;
    tables: EntitlementTable[];
    products: EntitlementProduct[];
    references: EntitlementReference[];
  };
  stats: ExtractionStats;
  warnings: string[];
}

/**
 * Search modes understood by the external search collaborator
 */
export type SearchMode = 'keyword' | 'vector' | 'hybrid';

export interface SearchFilters {
  docId?: string;
  sectionPath?: string[];
}

export interface SearchHit {
  chunkId: string;
  score: number;
  snippet: string;
  sectionPath: string[];
  clauseRef?: string;
  pageStart: number;
  pageEnd: number;
}

/**
 * Optional retrieval collaborator used to widen candidate sets
 */
export interface SearchCollaborator {
  search(query: string, filters: SearchFilters, mode: SearchMode): Promise<SearchHit[]>;
}

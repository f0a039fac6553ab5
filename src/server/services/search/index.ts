/**
 * Search Services
 *
 * The search collaborator contract and its in-process keyword implementation.
 */

export type { SearchCollaborator, SearchFilters, SearchHit, SearchMode } from '../../contracts/types.js';
export { KeywordSearchService, keywordScore, tokenize } from './KeywordSearchService.js';

/**
 * Contracts Module
 *
 * Shared data model for parsed documents, chunk sets and extraction results.
 */

export * from './types.js';

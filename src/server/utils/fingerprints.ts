/**
 * Fingerprint Utilities
 *
 * Deterministic identifiers for chunks. A chunkId depends only on the document,
 * the ordered source blocks and the chunking ruleset, so re-chunking the same
 * input reproduces the same ids and downstream upserts stay idempotent.
 */

import { createHash } from 'crypto';

/**
 * Compute SHA-256 fingerprint of a string
 *
 * @returns 64-character hex string (sha256)
 */
export function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Generate deterministic chunk ID
 * Format: "{docId}:{chunkingVersion}:{sha256(json([docId, blockIds, version/ruleset, part]))[0:16]}"
 *
 * @param docId - Document ID
 * @param chunkingVersion - Chunking version (e.g., "v1")
 * @param ruleset - Chunking ruleset (e.g., "2026-01")
 * @param sourceBlockIds - Ordered source block ids
 * @param partIndex - Part number when one oversized block yields several chunks
 */
export function generateChunkId(
  docId: string,
  chunkingVersion: string,
  ruleset: string,
  sourceBlockIds: readonly string[],
  partIndex?: number
): string {
  // JSON keeps block id boundaries, so ['a|b'] and ['a', 'b'] never collide
  const key = JSON.stringify([docId, sourceBlockIds, `${chunkingVersion}/${ruleset}`, partIndex ?? null]);
  const shortHash = sha256Hex(key).substring(0, 16);

  return `${docId}:${chunkingVersion}:${shortHash}`;
}

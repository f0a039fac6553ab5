/**
 * Timeout utility for wrapping async operations
 *
 * Used for calls into external collaborators (search) so a slow or hung
 * service cannot stall a document's extraction.
 */

import { RequestTimeoutError } from '../types/errors.js';

/**
 * Wrap a promise with a timeout
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Optional name for error messages
 * @returns The promise result or throws RequestTimeoutError
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  const operation = operationName || 'Operation';
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new RequestTimeoutError(`${operation} timed out after ${timeoutMs}ms`, { timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Text normalization shared by chunking and extraction.
 *
 * normalizeText runs on every block before any structural decision so chunk
 * boundaries never depend on raw whitespace.
 */

import { SNIPPET } from '../config/constants.js';

/**
 * Normalize block text:
 * - Normalize newlines to \n
 * - Collapse horizontal whitespace, trim it at line edges
 * - Rejoin words hyphenated across a line break (hy-\nphen -> hyphen)
 * - Collapse 3+ newlines to 2
 */
export function normalizeText(text: string): string {
  if (!text) return '';
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(/[ \t\f\v\u00a0]+/g, ' ')
    .replace(/ +\n/g, '\n')
    .replace(/\n +/g, '\n')
    .replace(/(\w)-\n(\w)/g, '$1$2')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Collapse every whitespace run (including newlines) to one space and trim
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Equality key for defined terms: trimmed, quotes stripped, whitespace collapsed,
 * case-insensitive. Display case is kept separately.
 */
export function normalizeTermKey(term: string): string {
  return collapseWhitespace(stripQuotes(term)).toLowerCase();
}

/**
 * Strip surrounding straight or curly quotes
 */
export function stripQuotes(text: string): string {
  return text.trim().replace(/^["'“”‘’]+/, '').replace(/["'“”‘’]+$/, '').trim();
}

/**
 * Build a snippet of text centred on the first occurrence of needle.
 * Falls back to the head of the text when needle is absent.
 */
export function makeSnippet(text: string, needle?: string): string {
  if (!text) return '';
  const idx = needle ? text.toLowerCase().indexOf(needle.toLowerCase()) : -1;
  if (idx === -1) {
    return text.length > SNIPPET.MAX_LENGTH ? `${text.substring(0, SNIPPET.MAX_LENGTH)}…` : text;
  }
  const start = Math.max(idx - SNIPPET.LEAD_CHARS, 0);
  const end = Math.min(idx + SNIPPET.TRAIL_CHARS, text.length);
  let snippet = text.substring(start, end);
  if (start > 0) snippet = `…${snippet}`;
  if (end < text.length) snippet = `${snippet}…`;
  return snippet;
}

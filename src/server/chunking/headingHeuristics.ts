/**
 * Heading and noise heuristics used when the parser's block kinds are absent or
 * unreliable.
 */

import type { NoiseReason, ParsedBlock } from '../contracts/types.js';

const NUMBERED_HEADING = /^\s*\d{1,3}(?:\.\d{1,3})*\.?\s+[A-Z]/;
const LEADING_CLAUSE_NUMBER = /^\s*(\d{1,3}(?:\.\d{1,3})*)\b/;
const TOP_LEVEL_ATTACHMENT = /^(?:schedule|appendix|annex|exhibit)\b/i;
const DEFINING_VERB = /\b(?:means|shall mean|has the meaning|is defined as)\b/i;

const SECTION_KEYWORDS = /\b(?:definitions|interpretation|term|audit|fees|schedule|appendix|annex|exhibit|license|licence|restrictions|termination|renewal|support|payment)\b/i;

const PAGE_NUMBER = /^\s*(?:page\s+)?[-–—]?\s*\d{1,4}\s*[-–—]?\s*(?:(?:of|\/)\s*\d{1,4})?\s*$/i;
const WATERMARK = /^\s*(?:confidential|strictly confidential|draft|copy|sample|internal use only)\s*$/i;

const MAX_HEADING_LENGTH = 120;
const MAX_HEADING_WORDS = 12;

/**
 * Short, single-line, unpunctuated text that reads like a heading
 */
export function looksLikeHeading(text: string): boolean {
  const t = text.trim();
  if (t.length < 2 || t.length > MAX_HEADING_LENGTH) return false;
  if (t.includes('\n')) return false;
  if (/[.;,]$/.test(t)) return false;
  if (DEFINING_VERB.test(t)) return false;

  const words = t.match(/[A-Za-z]+/g) ?? [];
  if (words.length === 0 || words.length > MAX_HEADING_WORDS) return false;

  if (NUMBERED_HEADING.test(t)) return true;

  const letters = t.replace(/[^A-Za-z]/g, '');
  const capsRatio = letters.length > 0 ? letters.replace(/[^A-Z]/g, '').length / letters.length : 0;
  const titleRatio = words.filter((w) => /^[A-Z]/.test(w)).length / words.length;

  if (letters.length >= 2 && (capsRatio > 0.8 || titleRatio > 0.8)) return true;
  if (SECTION_KEYWORDS.test(t) && (capsRatio > 0.5 || titleRatio > 0.6)) return true;

  return false;
}

/**
 * Heading depth: dotted numbering decides, then ALL CAPS and attachment titles sit
 * at the top level, everything else at level 2
 */
export function headingLevel(text: string): number {
  const t = text.trim();
  const numbered = LEADING_CLAUSE_NUMBER.exec(t);
  if (numbered) {
    return numbered[1].split('.').length;
  }
  if (/[A-Z]/.test(t) && t === t.toUpperCase()) return 1;
  if (TOP_LEVEL_ATTACHMENT.test(t)) return 1;
  return 2;
}

/**
 * Classify running headers/footers, page numbers and watermarks
 */
export function detectNoise(block: ParsedBlock, normalizedText: string): NoiseReason | undefined {
  if (block.kind === 'header') return 'header';
  if (block.kind === 'footer') return 'footer';
  if (block.kind === 'table' || block.kind === 'heading') return undefined;
  if (PAGE_NUMBER.test(normalizedText) && /\d/.test(normalizedText)) return 'page_number';
  if (WATERMARK.test(normalizedText)) return 'watermark';
  return undefined;
}

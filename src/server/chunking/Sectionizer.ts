/**
 * Sectionizer - assigns section paths and clause references to ordered blocks
 *
 * Walks one document's blocks with a heading stack. The stack is local to each
 * sectionize() call, so a Sectionizer instance can be reused across documents
 * without state leaking between them.
 */

import type { ParsedBlock, SectionFrame, SectionedBlock } from '../contracts/types.js';
import type { HeadingInferenceMode } from '../config/env.js';
import { normalizeText } from '../utils/textNormalization.js';
import { extractClauseReference } from './clauseReferences.js';
import { detectNoise, headingLevel, looksLikeHeading } from './headingHeuristics.js';
import { serializeTableRows } from './tableSerialization.js';

export interface SectionizerOptions {
  headingInference: HeadingInferenceMode;
}

export class Sectionizer {
  constructor(private readonly options: SectionizerOptions) {}

  sectionize(blocks: readonly ParsedBlock[]): SectionedBlock[] {
    const stack: SectionFrame[] = [];
    const inferHeadings = this.shouldInferHeadings(blocks);
    const sectioned: SectionedBlock[] = [];

    const currentPath = (): string[] => stack.map((frame) => frame.headingText);

    for (const block of blocks) {
      const text = blockText(block);
      const noise = detectNoise(block, text);

      if (noise) {
        sectioned.push({ block, text, sectionPath: currentPath(), isHeading: false, noise });
        continue;
      }

      const isTable = block.kind === 'table' || block.table !== undefined;
      const isHeading =
        text.length > 0 &&
        !isTable &&
        (block.kind === 'heading' ||
          (inferHeadings && (block.kind === 'paragraph' || block.kind === 'unknown') && looksLikeHeading(text)));

      if (isHeading) {
        const level = headingLevel(text);
        while (stack.length > 0 && stack[stack.length - 1].level >= level) {
          stack.pop();
        }
        stack.push({ headingText: text, level });
        const clause = extractClauseReference(text);
        sectioned.push({
          block,
          text,
          sectionPath: currentPath(),
          isHeading: true,
          headingLevel: level,
          ...(clause ? { clauseRef: clause.clauseRef, clauseLevel: clause.clauseLevel } : {}),
        });
        continue;
      }

      const clause = isTable ? null : extractClauseReference(text);
      sectioned.push({
        block,
        text,
        sectionPath: currentPath(),
        isHeading: false,
        ...(clause ? { clauseRef: clause.clauseRef, clauseLevel: clause.clauseLevel } : {}),
      });
    }

    return sectioned;
  }

  private shouldInferHeadings(blocks: readonly ParsedBlock[]): boolean {
    switch (this.options.headingInference) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'auto':
        return !blocks.some((block) => block.kind === 'heading');
    }
  }
}

/**
 * Normalized text of a block; tables prefer their serialized rows
 */
function blockText(block: ParsedBlock): string {
  if (block.table && block.table.rows.length > 0) {
    const serialized = serializeTableRows(block.table.rows);
    if (serialized) return normalizeText(serialized);
  }
  return normalizeText(block.text);
}

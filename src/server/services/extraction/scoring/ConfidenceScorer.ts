/**
 * Confidence scoring for extracted records. Every score is clamped to [0, 1]
 * and rounded to two decimals so repeated runs compare equal.
 */

import type { DefinitionPattern, TableType } from '../../../contracts/types.js';
import { DEFINITION_LIMITS } from '../../../config/constants.js';

export function clampConfidence(score: number): number {
  const clamped = Math.max(0, Math.min(1, score));
  return Math.round(clamped * 100) / 100;
}

export interface DefinitionSignals {
  inDefinitionsSection: boolean;
  pattern: DefinitionPattern;
  hasClauseRef: boolean;
  termLength: number;
  definitionLength: number;
}

export function scoreDefinition(signals: DefinitionSignals): number {
  let score = 0.4;
  if (signals.inDefinitionsSection) score += 0.25;
  if (signals.pattern === 'quoted' || signals.pattern === 'semicolon_run') score += 0.2;
  if (signals.hasClauseRef) score += 0.1;
  if (
    signals.definitionLength >= DEFINITION_LIMITS.GOOD_DEFINITION_MIN &&
    signals.definitionLength <= DEFINITION_LIMITS.GOOD_DEFINITION_MAX
  ) {
    score += 0.05;
  }
  if (signals.termLength > DEFINITION_LIMITS.LONG_TERM_LENGTH) score -= 0.2;
  if (signals.definitionLength < DEFINITION_LIMITS.SHORT_DEFINITION_LENGTH) score -= 0.2;
  return clampConfidence(score);
}

export interface TableProductSignals {
  tableType: TableType;
  hasMetric: boolean;
  numericQuantity: boolean;
  productCellEmpty: boolean;
}

export function scoreTableProduct(signals: TableProductSignals): number {
  let score = 0.6;
  if (signals.tableType === 'licensed_programs') score += 0.2;
  if (signals.hasMetric) score += 0.1;
  if (signals.numericQuantity) score += 0.1;
  if (signals.productCellEmpty) score -= 0.2;
  return clampConfidence(score);
}

export interface ProseProductSignals {
  strongName: boolean;
  hasMetric: boolean;
  hasQuantity: boolean;
  ambiguousPronoun: boolean;
}

export function scoreProseProduct(signals: ProseProductSignals): number {
  let score = 0.45;
  if (signals.strongName) score += 0.15;
  if (signals.hasMetric) score += 0.15;
  if (signals.hasQuantity) score += 0.1;
  if (signals.ambiguousPronoun && !signals.strongName) score -= 0.2;
  return clampConfidence(score);
}

export function scoreTable(tableType: TableType, headerless: boolean): number {
  return clampConfidence((tableType === 'unknown' ? 0.6 : 0.8) - (headerless ? 0.1 : 0));
}

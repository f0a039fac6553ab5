import { describe, it, expect } from 'vitest';
import { clampConfidence, scoreDefinition, scoreProseProduct, scoreTable, scoreTableProduct } from './ConfidenceScorer.js';

describe('ConfidenceScorer', () => {
  it('clamps to [0, 1] and rounds to two decimals', () => {
    expect(clampConfidence(1.234)).toBe(1);
    expect(clampConfidence(-0.5)).toBe(0);
    expect(clampConfidence(0.456)).toBe(0.46);
  });

  it('penalises long terms and short definitions', () => {
    const base = { inDefinitionsSection: true, pattern: 'quoted' as const, hasClauseRef: false };
    expect(scoreDefinition({ ...base, termLength: 9, definitionLength: 40 })).toBe(0.9);
    expect(scoreDefinition({ ...base, termLength: 70, definitionLength: 40 })).toBe(0.7);
    expect(scoreDefinition({ ...base, termLength: 9, definitionLength: 5 })).toBe(0.65);
  });

  it('scores table products by table type and cell signals', () => {
    const full = { tableType: 'licensed_programs' as const, hasMetric: true, numericQuantity: true, productCellEmpty: false };
    expect(scoreTableProduct(full)).toBe(1);
    expect(scoreTableProduct({ ...full, productCellEmpty: true })).toBe(0.8);
    expect(scoreTableProduct({ ...full, tableType: 'unknown', hasMetric: false })).toBe(0.7);
  });

  it('only penalises an ambiguous pronoun when the name is weak', () => {
    expect(scoreProseProduct({ strongName: true, hasMetric: true, hasQuantity: true, ambiguousPronoun: true })).toBe(0.85);
    expect(scoreProseProduct({ strongName: false, hasMetric: true, hasQuantity: false, ambiguousPronoun: true })).toBe(0.4);
  });

  it('scores tables by type and header presence', () => {
    expect(scoreTable('pricing', false)).toBe(0.8);
    expect(scoreTable('unknown', true)).toBe(0.5);
  });
});

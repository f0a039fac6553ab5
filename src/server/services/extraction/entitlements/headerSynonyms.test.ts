import { describe, it, expect } from 'vitest';
import { canonicalColumn, classifyTable } from './headerSynonyms.js';
import { canonicalMetric } from './metrics.js';

describe('canonicalColumn', () => {
  it('maps header synonyms to canonical columns', () => {
    expect(canonicalColumn('Licensed Programs')).toBe('product');
    expect(canonicalColumn('Qty (units)')).toBe('quantity');
    expect(canonicalColumn('License Metric')).toBe('metric');
    expect(canonicalColumn('Unit Price')).toBe('price');
    expect(canonicalColumn('Notes')).toBe('restrictions');
  });

  it('keeps the normalized text of unmapped headers', () => {
    expect(canonicalColumn('Support Level')).toBe('support level');
  });
});

describe('classifyTable', () => {
  it('classifies by the strongest signal group', () => {
    expect(classifyTable(['Licensed Programs', 'License Metric', 'Quantity'])).toBe('licensed_programs');
    expect(classifyTable(['Description', 'Unit Price', 'Total'])).toBe('pricing');
    expect(classifyTable(['Product', 'CSI', 'Support Level'])).toBe('support');
    expect(classifyTable(['Name', 'Value'])).toBe('unknown');
  });
});

describe('canonicalMetric', () => {
  it('prefers the longest metric phrase', () => {
    expect(canonicalMetric('Named User Plus')).toBe('named_user_plus');
    expect(canonicalMetric('Named User')).toBe('named_user');
    expect(canonicalMetric('per CPU')).toBe('processor');
    expect(canonicalMetric('Enterprise')).toBeNull();
    expect(canonicalMetric(undefined)).toBeNull();
  });
});

import { describe, it, expect } from 'vitest';
import { parseQuantity } from './QuantityParser.js';

describe('parseQuantity', () => {
  it('parses plain numbers with separators and decimals', () => {
    expect(parseQuantity('6')).toEqual({ quantity: 6 });
    expect(parseQuantity('1,500')).toEqual({ quantity: 1500 });
    expect(parseQuantity(' 2.5 ')).toEqual({ quantity: 2.5 });
  });

  it('keeps trailing unit words', () => {
    expect(parseQuantity('25 Named User Plus')).toEqual({ quantity: 25, unitText: 'Named User Plus' });
  });

  it('keeps qualified values and ranges raw', () => {
    expect(parseQuantity('up to 50')).toEqual({ quantity: 'up to 50' });
    expect(parseQuantity('10-20')).toEqual({ quantity: '10-20' });
  });

  it('returns null for empty cells', () => {
    expect(parseQuantity('')).toEqual({ quantity: null });
    expect(parseQuantity(undefined)).toEqual({ quantity: null });
  });
});

import { describe, it, expect } from 'vitest';
import { serializeTableRows } from '../../../chunking/tableSerialization.js';
import { makeChunk } from '../testing/fixtures.js';
import { TableExtractor, detectHeaderRow } from './TableExtractor.js';

function tableChunk(rows: string[][], overrides: { heading?: string; withRows?: boolean } = {}) {
  return makeChunk(0, {
    kind: 'table',
    text: serializeTableRows(rows),
    pageStart: 4,
    pageEnd: 4,
    sectionPath: ['Schedule A'],
    ...(overrides.heading ? { heading: overrides.heading } : {}),
    ...(overrides.withRows === false ? {} : { table: { rows } }),
  });
}

const LICENSED_PROGRAMS = [
  ['Licensed Programs', 'License Metric', 'Quantity', 'Term'],
  ['WebLogic Server Enterprise Edition', 'Processor', '6', '36 months'],
];

describe('detectHeaderRow', () => {
  it('uses the second row when the first is a title', () => {
    const detection = detectHeaderRow([['Schedule B Support', ''], ['Product', 'CSI', 'Support Level'], ['Database', '12345', 'Premier']]);
    expect(detection.headers).toEqual(['Product', 'CSI', 'Support Level']);
    expect(detection.titleRow).toEqual(['Schedule B Support', '']);
    expect(detection.dataRows).toEqual([['Database', '12345', 'Premier']]);
  });

  it('synthesizes column names when no header row is found', () => {
    const detection = detectHeaderRow([['Database Standard Edition', '2', 'Processor']]);
    expect(detection.headers).toEqual(['col_1', 'col_2', 'col_3']);
    expect(detection.headerless).toBe(true);
  });
});

describe('TableExtractor', () => {
  const extractor = new TableExtractor();

  it('extracts a licensed-programs row with a numeric quantity and full confidence', () => {
    const chunk = tableChunk(LICENSED_PROGRAMS, { heading: 'Licensed Programs' });

    const result = extractor.extract(chunk);

    expect(result?.table).toMatchObject({
      title: 'Licensed Programs',
      tableType: 'licensed_programs',
      headers: ['Licensed Programs', 'License Metric', 'Quantity', 'Term'],
      rows: [{ product: 'WebLogic Server Enterprise Edition', metric: 'Processor', quantity: '6', term: '36 months' }],
      confidence: 0.8,
    });
    expect(result?.products).toHaveLength(1);
    expect(result?.products[0]).toMatchObject({
      name: 'WebLogic Server Enterprise Edition',
      metric: 'processor',
      quantity: 6,
      unit: 'processor',
      term: { raw: '36 months', duration: '36 months' },
      territory: null,
      restrictions: [],
      source: 'table',
      confidence: 1,
    });
    expect(result?.products[0].evidence).toEqual([
      { chunkId: 'doc-test:v1:c0', pageStart: 4, pageEnd: 4, snippet: chunk.text },
    ]);
  });

  it('recovers rows from the serialized text when raw rows are missing', () => {
    const result = extractor.extract(tableChunk(LICENSED_PROGRAMS, { withRows: false }));

    expect(result?.table.title).toBe('Schedule A');
    expect(result?.products.map((p) => [p.name, p.quantity])).toEqual([['WebLogic Server Enterprise Edition', 6]]);
  });

  it('folds a continuation row into the previous row restrictions', () => {
    const result = extractor.extract(
      tableChunk([
        ['Product', 'Metric', 'Quantity', 'Notes'],
        ['Database Enterprise Edition', 'Processor', '4', ''],
        ['', '', '', 'Limited to one data centre'],
      ])
    );

    expect(result?.products).toHaveLength(1);
    expect(result?.products[0].restrictions).toEqual(['Limited to one data centre']);
    expect(result?.table.rows).toEqual([
      { product: 'Database Enterprise Edition', metric: 'Processor', quantity: '4', restrictions: 'Limited to one data centre' },
    ]);
  });

  it('takes the title from a title row above the header', () => {
    const result = extractor.extract(
      tableChunk([['Schedule B Support', ''], ['Product', 'CSI', 'Support Level'], ['Database', '12345', 'Premier']])
    );

    expect(result?.table.title).toBe('Schedule B Support');
    expect(result?.table.tableType).toBe('support');
    expect(result?.products[0]).toMatchObject({ name: 'Database', metric: null, quantity: null, unit: null, term: null, confidence: 0.6 });
  });

  it('reads headerless rows only when they carry a numeric quantity', () => {
    const result = extractor.extract(tableChunk([['Database Standard Edition', '2', 'Processor', '12 months']]));

    expect(result?.table).toMatchObject({ tableType: 'unknown', headers: ['col_1', 'col_2', 'col_3', 'col_4'], confidence: 0.5 });
    expect(result?.products[0]).toMatchObject({
      name: 'Database Standard Edition',
      metric: 'processor',
      quantity: 2,
      unit: 'processor',
      term: { raw: '12 months', duration: '12 months' },
      confidence: 0.8,
    });
  });

  it('returns null for an empty table', () => {
    expect(extractor.extract(makeChunk(0, { kind: 'table', text: '', table: { rows: [['', '']] } }))).toBeNull();
  });
});

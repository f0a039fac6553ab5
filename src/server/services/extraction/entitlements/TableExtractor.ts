/**
 * TableExtractor - entitlement tables and table-sourced products
 *
 * Detects the header row, maps headers to canonical columns, folds continuation
 * rows into the previous row's restrictions and derives one product per
 * remaining row that names a product.
 */

import type { Chunk, EntitlementProduct, EntitlementTable, Evidence, TableType } from '../../../contracts/types.js';
import { parseSerializedTable } from '../../../chunking/tableSerialization.js';
import { collapseWhitespace, makeSnippet } from '../../../utils/textNormalization.js';
import { scoreTable, scoreTableProduct } from '../scoring/ConfidenceScorer.js';
import { HEADER_KEYWORD, canonicalColumn, classifyTable } from './headerSynonyms.js';
import { canonicalMetric } from './metrics.js';
import { parseQuantity } from './QuantityParser.js';
import { TermParser } from './TermParser.js';

export interface TableExtraction {
  table: EntitlementTable;
  products: EntitlementProduct[];
}

interface HeaderDetection {
  headers: string[];
  dataRows: string[][];
  titleRow?: string[];
  headerless: boolean;
}

interface WorkingRow {
  values: Record<string, string>;
  extraRestrictions: string[];
}

const NUMERIC_CELL = /^[\d\s.,%$€£()+-]+$/;

/** Columns joined with these separators when several headers map to the same one */
const DUPLICATE_JOINERS: Readonly<Record<string, string>> = {
  term: ' to ',
  restrictions: '; ',
};

function isNumericCell(cell: string): boolean {
  return NUMERIC_CELL.test(cell.trim());
}

function isHeaderRow(row: readonly string[]): boolean {
  return row.filter((cell) => cell.trim() && !isNumericCell(cell) && HEADER_KEYWORD.test(cell)).length >= 2;
}

export function detectHeaderRow(rows: readonly string[][]): HeaderDetection {
  if (rows.length > 0 && isHeaderRow(rows[0])) {
    return { headers: rows[0].map((cell) => collapseWhitespace(cell)), dataRows: rows.slice(1), headerless: false };
  }
  if (rows.length > 1 && isHeaderRow(rows[1])) {
    return {
      headers: rows[1].map((cell) => collapseWhitespace(cell)),
      dataRows: rows.slice(2),
      titleRow: rows[0],
      headerless: false,
    };
  }
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  return {
    headers: Array.from({ length: width }, (_, i) => `col_${i + 1}`),
    dataRows: [...rows],
    headerless: true,
  };
}

export class TableExtractor {
  constructor(private readonly termParser: TermParser = new TermParser()) {}

  extract(chunk: Chunk): TableExtraction | null {
    const rows = (chunk.table?.rows ?? parseSerializedTable(chunk.text)).map((row) => row.map((cell) => cell.trim()));
    const nonEmpty = rows.filter((row) => row.some((cell) => cell.length > 0));
    if (nonEmpty.length === 0) return null;

    const detection = detectHeaderRow(nonEmpty);
    const tableType: TableType = detection.headerless ? 'unknown' : classifyTable(detection.headers);
    const columns = detection.headers.map((header) => (detection.headerless ? header : canonicalColumn(header)));
    const workingRows = this.normalizeRows(columns, detection.dataRows);

    const titleFromRow = detection.titleRow ? collapseWhitespace(detection.titleRow.filter(Boolean).join(' ')) : '';
    const title = titleFromRow || chunk.heading || chunk.sectionPath[chunk.sectionPath.length - 1] || null;

    const table: EntitlementTable = {
      title,
      tableType,
      headers: detection.headers,
      rows: workingRows.map((row) => toOutputRow(row)),
      confidence: scoreTable(tableType, detection.headerless),
      evidence: [this.evidence(chunk, makeSnippet(chunk.text))],
    };

    const products = workingRows.flatMap((row) => {
      const product = detection.headerless
        ? this.headerlessProduct(row, chunk)
        : this.product(row, tableType, chunk);
      return product ? [product] : [];
    });

    return { table, products };
  }

  /**
   * Map cells to columns and fold continuation rows into their predecessor
   */
  private normalizeRows(columns: readonly string[], dataRows: readonly string[][]): WorkingRow[] {
    const result: WorkingRow[] = [];
    const hasProductColumn = columns.includes('product');

    for (const cells of dataRows) {
      const values: Record<string, string> = {};
      columns.forEach((column, index) => {
        const cell = cells[index] ?? '';
        if (!cell) {
          if (!(column in values)) values[column] = '';
          return;
        }
        const existing = values[column];
        values[column] = existing ? `${existing}${DUPLICATE_JOINERS[column] ?? ' '}${cell}` : cell;
      });

      const filled = Object.entries(values).filter(([, value]) => value.length > 0);
      if (filled.length === 0) continue;

      const previous = result[result.length - 1];
      if (hasProductColumn && !values.product && previous) {
        previous.extraRestrictions.push(filled.map(([, value]) => value).join(' '));
        continue;
      }

      result.push({ values, extraRestrictions: [] });
    }

    return result;
  }

  private product(row: WorkingRow, tableType: TableType, chunk: Chunk): EntitlementProduct | null {
    const { values } = row;
    const productCellEmpty = !values.product;
    const name = values.product || values.sku || '';
    if (!name) return null;

    const metricCell = values.metric || '';
    const parsed = parseQuantity(values.quantity);
    const numericQuantity = typeof parsed.quantity === 'number';
    const metric = canonicalMetric(metricCell) ?? (metricCell || null);
    const unit = canonicalMetric(metricCell) ?? canonicalMetric(parsed.unitText) ?? parsed.unitText ?? null;

    return {
      name,
      metric,
      quantity: parsed.quantity,
      unit,
      term: this.termParser.parse(values.term),
      territory: values.territory || null,
      restrictions: restrictionsOf(row),
      source: 'table',
      confidence: scoreTableProduct({ tableType, hasMetric: metric !== null, numericQuantity, productCellEmpty }),
      evidence: [this.evidence(chunk, makeSnippet(chunk.text, name))],
    };
  }

  /**
   * Without headers a row is a product only when it carries a plain numeric
   * quantity; the first cell names it
   */
  private headerlessProduct(row: WorkingRow, chunk: Chunk): EntitlementProduct | null {
    const cells = Object.keys(row.values)
      .sort((a, b) => parseInt(a.replace('col_', ''), 10) - parseInt(b.replace('col_', ''), 10))
      .map((key) => row.values[key]);
    const name = cells[0];
    if (!name || isNumericCell(name)) return null;

    const rest = cells.slice(1);
    const quantityCell = rest.find((cell) => typeof parseQuantity(cell).quantity === 'number');
    if (quantityCell === undefined) return null;

    const parsed = parseQuantity(quantityCell);
    const metric = rest.map((cell) => canonicalMetric(cell)).find((value) => value !== null) ?? null;
    const termCell = rest.find((cell) => this.termParser.hasTermSignal(cell) && cell !== quantityCell);

    return {
      name,
      metric,
      quantity: parsed.quantity,
      unit: metric ?? canonicalMetric(parsed.unitText) ?? parsed.unitText ?? null,
      term: this.termParser.parse(termCell),
      territory: null,
      restrictions: row.extraRestrictions,
      source: 'table',
      confidence: scoreTableProduct({ tableType: 'unknown', hasMetric: metric !== null, numericQuantity: true, productCellEmpty: false }),
      evidence: [this.evidence(chunk, makeSnippet(chunk.text, name))],
    };
  }

  private evidence(chunk: Chunk, snippet: string): Evidence {
    return {
      chunkId: chunk.chunkId,
      pageStart: chunk.pageStart,
      pageEnd: chunk.pageEnd,
      ...(chunk.clauseRef ? { clauseRef: chunk.clauseRef } : {}),
      snippet,
    };
  }
}

function restrictionsOf(row: WorkingRow): string[] {
  const own = row.values.restrictions;
  return [...(own ? [own] : []), ...row.extraRestrictions];
}

function toOutputRow(row: WorkingRow): Record<string, string> {
  const restrictions = restrictionsOf(row);
  if (restrictions.length === 0) return { ...row.values };
  return { ...row.values, restrictions: restrictions.join('; ') };
}

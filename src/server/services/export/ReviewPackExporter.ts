/**
 * Review pack and CSV renderers for extraction results
 *
 * Renderers return strings; writing files is the caller's job. Review pack
 * sections replace an existing section of the same name in place, so re-running
 * an extraction updates the pack instead of appending to it.
 */

import type {
  DefinitionsResult,
  EntitlementProduct,
  EntitlementTerm,
  EntitlementsResult,
} from '../../contracts/types.js';
import { canonicalColumn } from '../extraction/entitlements/headerSynonyms.js';

export const REVIEW_PACK_TITLE = '# Review Pack';
export const DEFINITIONS_SECTION = '## Definitions';
export const ENTITLEMENTS_SECTION = '## Entitlements & Schedules';

const PLACEHOLDER = '-';

/**
 * Escape CSV field value
 */
export function escapeCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

function csvLine(values: Array<string | number | null | undefined>): string {
  return values.map((value) => escapeCsvField(value)).join(',');
}

function escapeTableCell(value: string | number | null | undefined): string {
  if (value === null || value === undefined || value === '') return PLACEHOLDER;
  return String(value).replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

export function formatTerm(term: EntitlementTerm | null): string {
  if (!term) return '';
  if (term.start && term.end) return `${term.start} to ${term.end}`;
  return term.start ?? term.end ?? term.duration ?? term.raw ?? '';
}

export class ReviewPackExporter {
  definitionsCsv(result: DefinitionsResult): string {
    const lines = [csvLine(['doc_id', 'term', 'definition', 'confidence', 'page_start', 'clause_ref', 'section_path'])];
    for (const definition of result.definitions) {
      const evidence = definition.evidence[0];
      lines.push(
        csvLine([
          result.docId,
          definition.term,
          definition.definition,
          definition.confidence,
          evidence?.pageStart,
          evidence?.clauseRef ?? definition.location.clauseRef,
          definition.location.sectionPath.join(' > '),
        ])
      );
    }
    return `${lines.join('\n')}\n`;
  }

  entitlementsCsv(result: EntitlementsResult): string {
    const lines = [csvLine(['doc_id', 'product_name', 'metric', 'quantity', 'unit', 'term', 'restrictions', 'page_start'])];
    for (const product of result.entitlements.products) {
      lines.push(
        csvLine([
          result.docId,
          product.name,
          product.metric,
          product.quantity,
          product.unit,
          formatTerm(product.term),
          product.restrictions.join('; '),
          product.evidence[0]?.pageStart,
        ])
      );
    }
    return `${lines.join('\n')}\n`;
  }

  definitionsSection(result: DefinitionsResult): string {
    const lines = [DEFINITIONS_SECTION, '', '| Term | Definition | Page | Clause | Conflict |', '| --- | --- | --- | --- | --- |'];
    for (const definition of result.definitions) {
      const evidence = definition.evidence[0];
      lines.push(
        `| ${escapeTableCell(definition.term)} | ${escapeTableCell(definition.definition)} | ${escapeTableCell(
          evidence?.pageStart
        )} | ${escapeTableCell(evidence?.clauseRef)} | ${definition.conflict ? 'yes' : ''} |`
      );
    }
    return `${lines.join('\n')}\n`;
  }

  entitlementsSection(result: EntitlementsResult): string {
    const { status, tables, products, references } = result.entitlements;
    const lines = [ENTITLEMENTS_SECTION, ''];

    if (status !== 'OK') {
      lines.push(`**Status:** ${status}`, '');
    }

    for (const table of tables) {
      lines.push(`### ${table.title ?? 'Table'} (${table.tableType})`);
      if (table.headers.length > 0) {
        lines.push(`| ${table.headers.map((header) => escapeTableCell(header)).join(' | ')} |`);
        lines.push(`| ${table.headers.map(() => '---').join(' | ')} |`);
        for (const row of table.rows) {
          const cells = table.headers.map((header) => row[header in row ? header : canonicalColumn(header)]);
          lines.push(`| ${cells.map((cell) => escapeTableCell(cell)).join(' | ')} |`);
        }
      }
      lines.push('');
    }

    if (products.length > 0) {
      lines.push('### Normalized Products', '| Product | Metric | Qty | Term | Source |', '| --- | --- | --- | --- | --- |');
      for (const product of products) {
        lines.push(productRow(product));
      }
      lines.push('');
    }

    if (references.length > 0) {
      lines.push('### References');
      for (const reference of references) {
        lines.push(`- ${reference.refType}: ${reference.refText} (p.${reference.evidence[0]?.pageStart ?? PLACEHOLDER})`);
      }
      lines.push('');
    }

    return `${lines.join('\n')}\n`;
  }

  /**
   * Insert or replace a `## ` section in an existing review pack
   */
  updateReviewPack(existing: string | null, section: string): string {
    if (existing === null) {
      return `${REVIEW_PACK_TITLE}\n\n${section}`;
    }

    const header = section.split('\n')[0];
    const start = existing.indexOf(header);
    if (start === -1) {
      return `${existing.trimEnd()}\n\n${section}`;
    }

    const before = existing.substring(0, start);
    const rest = existing.substring(start + header.length);
    const nextSection = rest.indexOf('\n## ');
    if (nextSection === -1) {
      return `${before}${section}`;
    }
    return `${before}${section}\n${rest.substring(nextSection + 1)}`;
  }
}

function productRow(product: EntitlementProduct): string {
  return `| ${escapeTableCell(product.name)} | ${escapeTableCell(product.metric)} | ${escapeTableCell(product.quantity)} | ${escapeTableCell(
    formatTerm(product.term)
  )} | ${product.source} |`;
}

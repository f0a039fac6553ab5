/**
 * Table header vocabulary: synonyms for canonical columns and the signal groups
 * used to classify a table
 */

import type { CanonicalColumn, TableType } from '../../../contracts/types.js';

export const HEADER_SYNONYMS: Readonly<Record<string, CanonicalColumn>> = {
  program: 'product',
  programs: 'product',
  product: 'product',
  products: 'product',
  service: 'product',
  services: 'product',
  'licensed program': 'product',
  'licensed programs': 'product',
  item: 'product',
  metric: 'metric',
  'license metric': 'metric',
  'licence metric': 'metric',
  measure: 'metric',
  qty: 'quantity',
  quantity: 'quantity',
  units: 'quantity',
  number: 'quantity',
  term: 'term',
  'subscription term': 'term',
  start: 'term',
  'start date': 'term',
  end: 'term',
  'end date': 'term',
  territory: 'territory',
  region: 'territory',
  restriction: 'restrictions',
  restrictions: 'restrictions',
  limitations: 'restrictions',
  notes: 'restrictions',
  sku: 'sku',
  part: 'sku',
  'part number': 'sku',
  'item code': 'sku',
  csi: 'csi',
  'support id': 'csi',
  price: 'price',
  'unit price': 'price',
  'net price': 'price',
  rate: 'price',
  total: 'price',
  fee: 'price',
  fees: 'price',
};

function keywordPattern(keywords: readonly string[]): RegExp {
  const alternatives = [...keywords]
    .sort((a, b) => b.length - a.length)
    .map((keyword) => keyword.replace(/\s+/g, '\\s+'));
  return new RegExp(`\\b(?:${alternatives.join('|')})\\b`, 'i');
}

const SYNONYM_KEYS = Object.keys(HEADER_SYNONYMS).sort((a, b) => b.length - a.length);

export const HEADER_KEYWORD = keywordPattern(SYNONYM_KEYS);

export function normalizeHeaderText(cell: string): string {
  return cell
    .toLowerCase()
    .replace(/\([^)]*\)/g, ' ')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/**
 * Canonical column for a header cell; unmapped headers keep their normalized text
 */
export function canonicalColumn(header: string): string {
  const normalized = normalizeHeaderText(header);
  if (!normalized) return header.trim().toLowerCase();

  const exact = HEADER_SYNONYMS[normalized];
  if (exact) return exact;

  const contained = SYNONYM_KEYS.find((key) => new RegExp(`\\b${key.replace(/\s+/g, '\\s+')}\\b`).test(normalized));
  return contained ? HEADER_SYNONYMS[contained] : normalized;
}

interface SignalGroup {
  tableType: Exclude<TableType, 'unknown'>;
  pattern: RegExp;
}

/** Ties go to the earlier group */
const SIGNAL_GROUPS: readonly SignalGroup[] = [
  { tableType: 'licensed_programs', pattern: keywordPattern(['program', 'programs', 'product', 'products', 'service', 'services', 'sku']) },
  { tableType: 'licensed_programs', pattern: keywordPattern(['metric', 'quantity', 'qty', 'units']) },
  { tableType: 'support', pattern: keywordPattern(['support', 'csi']) },
  { tableType: 'pricing', pattern: keywordPattern(['price', 'rate', 'total', 'currency', 'usd', 'eur', 'gbp']) },
];

export function classifyTable(headers: readonly string[]): TableType {
  let best: TableType = 'unknown';
  let bestScore = 0;
  for (const group of SIGNAL_GROUPS) {
    const score = headers.filter((header) => group.pattern.test(header)).length;
    if (score > bestScore) {
      best = group.tableType;
      bestScore = score;
    }
  }
  return best;
}

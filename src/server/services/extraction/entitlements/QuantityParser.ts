/**
 * Quantity cells: a plain number (thousands separators and decimals allowed),
 * optionally followed by unit words, is numeric. Qualified values such as
 * "up to 50" or ranges like "10-20" are kept as the raw string.
 */

export interface ParsedQuantity {
  quantity: number | string | null;
  unitText?: string;
}

const PLAIN_QUANTITY = /^(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?(?:\s+([A-Za-z][A-Za-z\s-]*))?$/;

export function parseQuantity(raw: string | undefined): ParsedQuantity {
  const value = raw?.trim() ?? '';
  if (!value) return { quantity: null };

  const match = PLAIN_QUANTITY.exec(value);
  if (!match) return { quantity: value };

  const quantity = Number(`${match[1].replace(/,/g, '')}${match[2] ? `.${match[2]}` : ''}`);
  const unitText = match[3]?.trim();
  return unitText ? { quantity, unitText } : { quantity };
}

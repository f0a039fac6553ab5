import type { EntitlementTerm } from '../../../contracts/types.js';

/**
 * Parses term cells and phrases into ISO dates and durations
 *
 * Supports:
 * - "2024-06-01"
 * - "1 June 2024" / "1st June 2024"
 * - "June 1, 2024"
 * - "31-MAY-2024"
 * - durations such as "36 months" or "3 years"
 * Slash dates (01/06/2024) are ambiguous between day and month order and are left raw.
 */
export class TermParser {
  private readonly isoPattern: RegExp = /\b(\d{4})-(\d{2})-(\d{2})\b/g;
  private readonly dayMonthPattern: RegExp = /\b(\d{1,2})(?:st|nd|rd|th)?[\s-]+([A-Za-z]{3,9})[\s-]+(\d{4})\b/g;
  private readonly monthDayPattern: RegExp = /\b([A-Za-z]{3,9})\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/g;
  private readonly durationPattern: RegExp = /\b(\d{1,3})\s*[-\s]?\s*(day|week|month|year)s?\b/i;

  private readonly months: Map<string, number>;

  constructor() {
    const names = ['january', 'february', 'march', 'april', 'may', 'june', 'july', 'august', 'september', 'october', 'november', 'december'];
    this.months = new Map();
    names.forEach((name, index) => {
      this.months.set(name, index + 1);
      this.months.set(name.substring(0, 3), index + 1);
    });
    this.months.set('sept', 9);
  }

  /**
   * Parse a term cell or phrase; null for empty input, `{ raw }` when nothing parses
   */
  parse(text: string | undefined): EntitlementTerm | null {
    const raw = text?.trim() ?? '';
    if (!raw) return null;

    const dates = this.extractDates(raw);
    const duration = this.extractDuration(raw);

    const term: EntitlementTerm = { raw };
    if (dates[0]) term.start = dates[0];
    if (dates[1]) term.end = dates[1];
    if (duration) term.duration = duration;
    return term;
  }

  /**
   * True when the text carries at least one date or duration
   */
  hasTermSignal(text: string): boolean {
    return this.extractDates(text).length > 0 || this.extractDuration(text) !== null;
  }

  /**
   * ISO dates in order of appearance
   */
  extractDates(text: string): string[] {
    const found: Array<{ index: number; iso: string }> = [];

    for (const match of text.matchAll(this.isoPattern)) {
      const iso = toIsoDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
      if (iso) found.push({ index: match.index ?? 0, iso });
    }

    for (const match of text.matchAll(this.dayMonthPattern)) {
      const month = this.months.get(match[2].toLowerCase());
      const iso = month ? toIsoDate(parseInt(match[3], 10), month, parseInt(match[1], 10)) : null;
      if (iso) found.push({ index: match.index ?? 0, iso });
    }

    for (const match of text.matchAll(this.monthDayPattern)) {
      const month = this.months.get(match[1].toLowerCase());
      const iso = month ? toIsoDate(parseInt(match[3], 10), month, parseInt(match[2], 10)) : null;
      if (iso) found.push({ index: match.index ?? 0, iso });
    }

    return found.sort((a, b) => a.index - b.index).map((entry) => entry.iso);
  }

  extractDuration(text: string): string | null {
    const match = this.durationPattern.exec(text);
    if (!match) return null;
    const count = parseInt(match[1], 10);
    const unit = match[2].toLowerCase();
    return `${count} ${unit}${count === 1 ? '' : 's'}`;
  }
}

function toIsoDate(year: number, month: number, day: number): string | null {
  if (year < 1900 || year > 2100 || month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Reject rollovers such as 31 February
  if (date.getUTCMonth() !== month - 1) return null;
  return date.toISOString().substring(0, 10);
}

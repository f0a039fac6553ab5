/**
 * Licence metric keywords mapped to canonical metric names. Longer phrases come
 * first so "named user plus" is not read as "user".
 */

const METRIC_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/\b(?:named users?\s+plus|nup)\b/i, 'named_user_plus'],
  [/\bnamed users?\b/i, 'named_user'],
  [/\b(?:processors?|cpus?)\b/i, 'processor'],
  [/\bcores?\b/i, 'core'],
  [/\bemployees?\b/i, 'employee'],
  [/\bseats?\b/i, 'seat'],
  [/\bdevices?\b/i, 'device'],
  [/\binstances?\b/i, 'instance'],
  [/\bservers?\b/i, 'server'],
  [/\busers?\b/i, 'user'],
];

export function canonicalMetric(text: string | undefined): string | null {
  if (!text) return null;
  for (const [pattern, metric] of METRIC_PATTERNS) {
    if (pattern.test(text)) return metric;
  }
  return null;
}

/**
 * True when nothing but metric keywords remains in the text ("Named User Plus",
 * "Processors")
 */
export function isMetricPhrase(text: string): boolean {
  let rest = text;
  for (const [pattern] of METRIC_PATTERNS) {
    rest = rest.replace(new RegExp(pattern.source, 'gi'), ' ');
  }
  return rest.replace(/[\s.,;:()-]+/g, '').length === 0;
}

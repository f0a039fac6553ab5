/**
 * DefinitionResolver - deduplication and conflict marking for definitions
 *
 * Records are grouped by normalized term. Inside a group, records whose texts are
 * materially the same collapse to one winner that carries every duplicate's
 * evidence. Materially different texts all survive with conflict = true.
 * Input must be in document order; ties fall back to that order.
 */

import type { DefinitionRecord, Evidence } from '../../../contracts/types.js';
import { normalizeTermKey } from '../../../utils/textNormalization.js';

export interface RawDefinition {
  record: DefinitionRecord;
  inDefinitionsSection: boolean;
  /** Position in document order */
  order: number;
}

const SAME_TEXT_JACCARD = 0.9;

export function normalizeDefinitionText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function tokenJaccard(a: string, b: string): number {
  const left = new Set(normalizeDefinitionText(a).split(' ').filter(Boolean));
  const right = new Set(normalizeDefinitionText(b).split(' ').filter(Boolean));
  if (left.size === 0 && right.size === 0) return 1;
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

export function isSameDefinition(a: string, b: string): boolean {
  return normalizeDefinitionText(a) === normalizeDefinitionText(b) || tokenJaccard(a, b) >= SAME_TEXT_JACCARD;
}

function isQuoted(raw: RawDefinition): boolean {
  return raw.record.pattern === 'quoted' || raw.record.pattern === 'semicolon_run';
}

/**
 * Preference: Definitions section, quoted pattern, confidence, earliest occurrence
 */
function compareStrength(a: RawDefinition, b: RawDefinition): number {
  if (a.inDefinitionsSection !== b.inDefinitionsSection) return a.inDefinitionsSection ? -1 : 1;
  if (isQuoted(a) !== isQuoted(b)) return isQuoted(a) ? -1 : 1;
  if (a.record.confidence !== b.record.confidence) return b.record.confidence - a.record.confidence;
  return a.order - b.order;
}

function mergeEvidence(members: RawDefinition[], winner: RawDefinition): Evidence[] {
  const merged: Evidence[] = [];
  const seen = new Set<string>();
  for (const member of [winner, ...members.filter((m) => m !== winner)]) {
    for (const evidence of member.record.evidence) {
      const key = `${evidence.chunkId}|${evidence.snippet}`;
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(evidence);
    }
  }
  return merged;
}

export class DefinitionResolver {
  resolve(raw: readonly RawDefinition[]): DefinitionRecord[] {
    const groups = new Map<string, RawDefinition[]>();
    for (const item of [...raw].sort((a, b) => a.order - b.order)) {
      const key = normalizeTermKey(item.record.term);
      const group = groups.get(key);
      if (group) {
        group.push(item);
      } else {
        groups.set(key, [item]);
      }
    }

    const resolved: Array<{ record: DefinitionRecord; order: number }> = [];
    for (const group of groups.values()) {
      const clusters: RawDefinition[][] = [];
      for (const item of group) {
        const cluster = clusters.find((c) => isSameDefinition(c[0].record.definition, item.record.definition));
        if (cluster) {
          cluster.push(item);
        } else {
          clusters.push([item]);
        }
      }

      const conflict = clusters.length > 1;
      for (const cluster of clusters) {
        const winner = [...cluster].sort(compareStrength)[0];
        resolved.push({
          record: { ...winner.record, evidence: mergeEvidence(cluster, winner), conflict },
          order: winner.order,
        });
      }
    }

    return resolved
      .sort((a, b) => {
        const left = a.record.term.toLowerCase();
        const right = b.record.term.toLowerCase();
        if (left !== right) return left < right ? -1 : 1;
        return a.order - b.order;
      })
      .map((entry) => entry.record);
  }
}

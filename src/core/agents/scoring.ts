/**
 * Capability scoring for best-agent selection.
 *
 * Kept free of registry state so it can be tested on plain tag sets.
 */

import type { AgentRequest } from '../../types/index.js';
import { readStringList } from './context.js';

export const DOMAIN_MATCH_WEIGHT = 10;
export const CAPABILITY_MATCH_WEIGHT = 1;

/**
 * Normalize a tag for comparison: trimmed and lower-cased
 */
export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/**
 * Build a normalized tag set, dropping empty tags
 */
export function toTagSet(tags: Iterable<string>): Set<string> {
  const result = new Set<string>();
  for (const tag of tags) {
    const normalized = normalizeTag(tag);
    if (normalized) {
      result.add(normalized);
    }
  }
  return result;
}

/**
 * score = 10 × (exact domain match) + 1 × |capabilities ∩ requestTags|
 */
export function scoreAgent(
  domainMatch: boolean,
  capabilities: ReadonlySet<string>,
  requestTags: ReadonlySet<string>
): number {
  let overlap = 0;
  for (const tag of requestTags) {
    if (capabilities.has(tag)) {
      overlap++;
    }
  }
  return (domainMatch ? DOMAIN_MATCH_WEIGHT : 0) + overlap * CAPABILITY_MATCH_WEIGHT;
}

/**
 * Tags a request offers for capability matching: its type, its context
 * domain, and any `tags` / `capabilities` listed in the context properties.
 */
export function requestTags(request: AgentRequest): Set<string> {
  const { properties } = request.context;
  return toTagSet([
    request.type,
    request.context.domain,
    ...readStringList(properties, 'tags'),
    ...readStringList(properties, 'capabilities'),
  ]);
}

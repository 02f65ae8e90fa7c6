/**
 * Pure name matching between independently generated entity names.
 *
 * Tiers, strongest first:
 *   1. exact          identical strings
 *   2. parenthetical  trailing "(...)" stripped, case-insensitive
 *   3. normalized     equal word multisets after lowercasing, punctuation
 *                     removal and a naive plural fold
 *   4. overlap        shared words: at least two, or the whole of a short
 *                     (one or two word) name
 *
 * A tie at tier 4 between different candidates is ambiguous and matches nothing.
 */

export const MATCH_TIERS = ['exact', 'parenthetical', 'normalized', 'overlap'] as const;
export type MatchTier = (typeof MATCH_TIERS)[number];

const TRAILING_PARENTHETICAL = /\s*\([^()]*\)\s*$/;

export function stripParenthetical(name: string): string {
  return name.replace(TRAILING_PARENTHETICAL, '').trim();
}

/** "Chefs' Knives!" → ["chef", "knive"]. Words of three letters or fewer keep their "s". */
export function normalizeWords(name: string): string[] {
  return name
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => (word.length > 3 && word.endsWith('s') ? word.slice(0, -1) : word));
}

/** "Workshop - Restored" → { base: "Workshop", version: "Restored" }. */
export function splitVersionSuffix(name: string): { base: string; version: string | null } {
  const idx = name.indexOf(' - ');
  if (idx === -1) return { base: name.trim(), version: null };

  const base = name.slice(0, idx).trim();
  const version = name.slice(idx + 3).trim();
  if (!base || !version) return { base: name.trim(), version: null };
  return { base, version };
}

function sameMultiset(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const sortedA = [...a].sort();
  const sortedB = [...b].sort();
  return sortedA.every((word, i) => word === sortedB[i]);
}

/** Shared distinct words, or 0 when the overlap is below the acceptance floor. */
export function overlapScore(query: string, candidate: string): number {
  const a = new Set(normalizeWords(query));
  const b = new Set(normalizeWords(candidate));
  if (a.size === 0 || b.size === 0) return 0;

  let shared = 0;
  for (const word of a) if (b.has(word)) shared++;

  const smaller = Math.min(a.size, b.size);
  if (shared >= 2) return shared;
  if (smaller <= 2 && shared === smaller) return shared;
  return 0;
}

export function matchTier(query: string, candidate: string): MatchTier | null {
  if (query === candidate) return 'exact';

  const strippedQuery = stripParenthetical(query).toLowerCase();
  if (strippedQuery && strippedQuery === stripParenthetical(candidate).toLowerCase()) {
    return 'parenthetical';
  }

  const queryWords = normalizeWords(query);
  if (queryWords.length > 0 && sameMultiset(queryWords, normalizeWords(candidate))) {
    return 'normalized';
  }

  if (overlapScore(query, candidate) > 0) return 'overlap';
  return null;
}

export interface MatchResult<T> {
  candidate: T;
  name: string;
  tier: MatchTier;
}

/**
 * Best candidate for `query`. Lower tiers win; within tiers 1–3 the first
 * candidate in order wins. At tier 4 the largest overlap wins and a tie between
 * different names is treated as ambiguous.
 */
export function findBestMatch<T>(
  query: string,
  candidates: readonly T[],
  nameOf: (candidate: T) => string,
): MatchResult<T> | null {
  for (const tier of MATCH_TIERS.slice(0, 3)) {
    for (const candidate of candidates) {
      const name = nameOf(candidate);
      if (matchTier(query, name) === tier) return { candidate, name, tier };
    }
  }

  let best: MatchResult<T> | null = null;
  let bestScore = 0;
  let tied = false;

  for (const candidate of candidates) {
    const name = nameOf(candidate);
    const score = overlapScore(query, name);
    if (score === 0) continue;

    if (score > bestScore) {
      best = { candidate, name, tier: 'overlap' };
      bestScore = score;
      tied = false;
    } else if (score === bestScore && best && best.name !== name) {
      tied = true;
    }
  }

  return tied ? null : best;
}

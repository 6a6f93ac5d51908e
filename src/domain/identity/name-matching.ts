/**
 * Fuzzy Name Matching
 *
 * Resolves free-text player or team queries against canonical identities.
 * Names are normalized first; a query equal to a normalized name or alias is an
 * exact match (score 1). Otherwise Fuse scores every name and alias, and a
 * candidate takes its best one as `1 - fuseScore`, capped just below 1 so that
 * only exact matches score 1.
 *
 * No async I/O, no logging.
 */

import Fuse from 'fuse.js';

export const MIN_SIMILARITY = 0.6;
const MAX_FUZZY_SCORE = 0.999;

const NAME_SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv', 'v']);

export interface IdentityCandidate {
  /** Canonical identity returned on a match (display name or team code) */
  canonical: string;
  /** Other spellings that should resolve to the canonical identity */
  aliases?: readonly string[];
}

export interface IdentityMatch {
  canonical: string;
  /** Normalized similarity in [0, 1] */
  score: number;
}

interface NameEntry {
  canonical: string;
  name: string;
}

/**
 * Fold accents, lowercase, strip punctuation and generational suffixes,
 * collapse whitespace.
 *
 * @example
 * normalizeName("Odell Beckham Jr."); // 'odell beckham'
 * normalizeName('José Abreu');        // 'jose abreu'
 */
export function normalizeName(name: string): string {
  const tokens = name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .split(/\s+/)
    .filter((token) => token.length > 0);

  // Keep a lone token even if it looks like a suffix
  while (tokens.length > 1 && NAME_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens.join(' ');
}

function nameEntries(candidates: readonly IdentityCandidate[]): NameEntry[] {
  return candidates.flatMap((candidate) =>
    [candidate.canonical, ...(candidate.aliases ?? [])]
      .map((name) => ({ canonical: candidate.canonical, name: normalizeName(name) }))
      .filter((entry) => entry.name.length > 0)
  );
}

function byScoreThenName(a: IdentityMatch, b: IdentityMatch): number {
  return b.score - a.score || (a.canonical < b.canonical ? -1 : a.canonical > b.canonical ? 1 : 0);
}

/**
 * Resolve a query against candidates.
 *
 * Returns matches at or above the threshold, best first (ties by name).
 * When some candidate matches exactly after normalization, only exact matches
 * are returned.
 */
export function resolveIdentity(
  query: string,
  candidates: readonly IdentityCandidate[],
  threshold: number = MIN_SIMILARITY
): IdentityMatch[] {
  const normalized = normalizeName(query);
  if (!normalized) return [];

  const entries = nameEntries(candidates);

  const exact = new Set(entries.filter((e) => e.name === normalized).map((e) => e.canonical));
  if (exact.size > 0) {
    return [...exact].map((canonical) => ({ canonical, score: 1 })).sort(byScoreThenName);
  }

  const fuse = new Fuse(entries, {
    keys: ['name'],
    threshold: 1 - threshold,
    includeScore: true,
    ignoreLocation: true,
    ignoreFieldNorm: true,
  });

  const best = new Map<string, number>();
  for (const result of fuse.search(normalized)) {
    const similarity = Math.min(MAX_FUZZY_SCORE, 1 - (result.score ?? 1));
    const previous = best.get(result.item.canonical) ?? 0;
    if (similarity > previous) best.set(result.item.canonical, similarity);
  }

  return [...best.entries()]
    .map(([canonical, score]) => ({ canonical, score: Math.round(score * 1000) / 1000 }))
    .filter((match) => match.score >= threshold)
    .sort(byScoreThenName);
}

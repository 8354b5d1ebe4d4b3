import type { MemoryRecord, SearchResult } from './types.js';

export const STOP_WORDS = new Set([
  'the', 'be', 'to', 'of', 'and', 'in', 'that', 'have', 'it', 'for', 'not',
  'on', 'with', 'he', 'as', 'you', 'do', 'at', 'this', 'but', 'his', 'by',
  'from', 'they', 'we', 'say', 'her', 'she', 'or', 'an', 'will', 'my', 'one',
  'all', 'would', 'there', 'their', 'what', 'so', 'up', 'out', 'if', 'about',
  'who', 'get', 'which', 'go', 'me', 'when', 'make', 'can', 'no', 'just',
  'him', 'know', 'take', 'how', 'could', 'them', 'see', 'than', 'now', 'come',
  'its', 'over', 'also', 'after', 'did', 'should', 'any', 'where', 'then',
  'here', 'been', 'has', 'had', 'was', 'were', 'are', 'is', 'am', 'does',
]);

/** Title contains the whole query as a phrase. */
export const TIER_TITLE_PHRASE = 2;
/** Content or tags contain the whole query as a phrase. */
export const TIER_BODY_PHRASE = 1;
export const TIER_TERMS = 0;

const BM25_WEIGHT = 0.99;

export function queryTerms(query: string): string[] {
  // split on punctuation so terms line up with index tokens; drops FTS5 syntax too
  return query
    .split(/[^a-zA-Z0-9\u00C0-\u024F_]+/)
    .filter(w => w.length > 1 && !STOP_WORDS.has(w.toLowerCase()));
}

/**
 * FTS5 MATCH expression: every term quoted so keywords like NEAR stay plain
 * text; prefix matching ("word"*) for words >= 3 chars to catch inflections,
 * exact match ("word") for short words, OR-ed together.
 */
export function buildMatchQuery(query: string): string {
  return queryTerms(query)
    .map(w => (w.length >= 3 ? `"${w}"*` : `"${w}"`))
    .join(' OR ');
}

function normalizePhrase(s: string): string {
  return s.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function phraseTier(record: Pick<MemoryRecord, 'title' | 'content' | 'tags'>, query: string): number {
  const phrase = normalizePhrase(query);
  if (!phrase) return TIER_TERMS;
  if (normalizePhrase(record.title).includes(phrase)) return TIER_TITLE_PHRASE;
  if (normalizePhrase(record.content).includes(phrase)) return TIER_BODY_PHRASE;
  if (record.tags.some(t => normalizePhrase(t) === phrase)) return TIER_BODY_PHRASE;
  return TIER_TERMS;
}

/**
 * Map raw FTS5 bm25 ranks (more negative = better) onto [0, 1], best = 1.
 * When every rank is equal they all score 1.
 */
export function normalizeRanks(ranks: number[]): number[] {
  if (ranks.length === 0) return [];
  const minRank = Math.min(...ranks);
  const maxRank = Math.max(...ranks);
  const range = maxRank - minRank || 1;
  return ranks.map(rank => {
    const score = 1 - (rank - minRank) / range;
    return Number.isFinite(score) ? score : 0;
  });
}

export function relevanceScore(tier: number, normalizedBm25: number): number {
  return tier + BM25_WEIGHT * normalizedBm25;
}

/** Relevance desc, then significance desc, then most recently accessed, then id. */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (b.score !== a.score) return b.score - a.score;
  if (b.record.significance !== a.record.significance) {
    return b.record.significance - a.record.significance;
  }
  if (b.record.lastAccessedAt !== a.record.lastAccessedAt) {
    return b.record.lastAccessedAt - a.record.lastAccessedAt;
  }
  return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0;
}

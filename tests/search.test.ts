import { describe, it, expect } from 'vitest';
import {
  buildMatchQuery,
  normalizeRanks,
  phraseTier,
  queryTerms,
  relevanceScore,
} from '../index.js';

describe('queryTerms', () => {
  it('drops stop words, single characters and FTS5 syntax', () => {
    expect(queryTerms('What is the "NEAR" (v2)?')).toEqual(['NEAR', 'v2']);
  });

  it('splits words on the punctuation the index tokenizes on', () => {
    expect(queryTerms('rate-limit config.ts')).toEqual(['rate', 'limit', 'config', 'ts']);
  });
});

describe('buildMatchQuery', () => {
  it('quotes every term and prefix-matches the longer ones', () => {
    expect(buildMatchQuery('sqlite db')).toBe('"sqlite"* OR "db"');
  });

  it('matches hyphenated words as separate terms', () => {
    expect(buildMatchQuery('rate-limit')).toBe('"rate"* OR "limit"*');
  });

  it('is empty when nothing indexable remains', () => {
    expect(buildMatchQuery('the of a')).toBe('');
  });
});

describe('normalizeRanks', () => {
  it('maps the best (most negative) rank to 1 and the worst to 0', () => {
    expect(normalizeRanks([-4, -2, 0])).toEqual([1, 0.5, 0]);
  });

  it('scores equal ranks as 1', () => {
    expect(normalizeRanks([-3, -3])).toEqual([1, 1]);
  });
});

describe('phraseTier', () => {
  const record = { title: 'Database Migration Plan', content: 'three  phases of rollout', tags: ['ops'] };

  it('ranks title phrases highest', () => {
    expect(phraseTier(record, 'database migration')).toBe(2);
  });

  it('ranks content phrases and exact tags next', () => {
    expect(phraseTier(record, 'three phases')).toBe(1);
    expect(phraseTier(record, 'OPS')).toBe(1);
  });

  it('falls back to term matches', () => {
    expect(phraseTier(record, 'plan rollout')).toBe(0);
  });

  it('keeps any phrase hit above any term-only hit', () => {
    expect(relevanceScore(1, 0)).toBeGreaterThan(relevanceScore(0, 1));
  });
});

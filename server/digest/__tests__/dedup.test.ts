import { describe, expect, it } from 'vitest';
import { deduplicateArticles, titleKey } from '../dedup';
import type { CanonicalArticle } from '../types';

const buildArticle = (overrides: Partial<CanonicalArticle> = {}): CanonicalArticle => ({
  id: 'a1',
  title: 'Toyota profit up 20%',
  sourceUrl: 'https://news.example.com/toyota',
  sourceName: 'Example Wire',
  sourceType: 'wire-news',
  category: 'finance',
  publishedAt: '2026-03-10T08:00:00.000Z',
  fetchedAt: '2026-03-10T12:00:00.000Z',
  language: 'en',
  relevanceScore: 50,
  rawPayload: {},
  isDuplicate: false,
  isCached: false,
  ...overrides,
});

describe('titleKey', () => {
  it('lower-cases and collapses digit runs', () => {
    expect(titleKey('Toyota profit up 20%')).toBe('toyota profit up 0%');
    expect(titleKey('Toyota  Profit up 35%')).toBe('toyota profit up 0%');
    expect(titleKey('Q3 2026 results')).toBe('q0 0 results');
  });
});

describe('deduplicateArticles', () => {
  it('keeps the higher-scored of two near-identical headlines', () => {
    const low = buildArticle({ id: 'low', title: 'Toyota profit up 20%', relevanceScore: 70 });
    const high = buildArticle({ id: 'high', title: 'Toyota profit up 35%', relevanceScore: 80 });
    const { unique, duplicates } = deduplicateArticles([low, high]);
    expect(unique).toEqual([high]);
    expect(high.isDuplicate).toBe(true);
    expect(duplicates).toEqual([{ article: low, duplicateOf: 'high', key: 'toyota profit up 0%' }]);
  });

  it('prefers the earlier publication on equal scores', () => {
    const later = buildArticle({ id: 'later', publishedAt: '2026-03-10T09:00:00.000Z' });
    const earlier = buildArticle({ id: 'earlier', publishedAt: '2026-03-10T07:00:00.000Z' });
    expect(deduplicateArticles([later, earlier]).unique.map((a) => a.id)).toEqual(['earlier']);
  });

  it('keeps the first seen on a full tie', () => {
    const first = buildArticle({ id: 'first' });
    const second = buildArticle({ id: 'second' });
    expect(deduplicateArticles([first, second]).unique.map((a) => a.id)).toEqual(['first']);
  });

  it('leaves distinct stories alone and in order', () => {
    const a = buildArticle({ id: 'a', title: 'Sony launches new camera' });
    const b = buildArticle({ id: 'b', title: 'Toyota profit up 20%' });
    const c = buildArticle({ id: 'c', title: 'Toyota profit up 21%', relevanceScore: 90 });
    const d = buildArticle({ id: 'd', title: 'Nintendo reveals console' });
    const { unique, duplicates } = deduplicateArticles([a, b, c, d]);
    expect(unique.map((article) => article.id)).toEqual(['a', 'c', 'd']);
    expect(unique.map((article) => article.isDuplicate)).toEqual([false, true, false]);
    expect(duplicates.map((entry) => entry.article.id)).toEqual(['b']);
  });

  it('is idempotent', () => {
    const first = deduplicateArticles([
      buildArticle({ id: 'x', title: 'Rates rise 1%' }),
      buildArticle({ id: 'y', title: 'Rates rise 2%', relevanceScore: 60 }),
    ]);
    const second = deduplicateArticles(first.unique);
    expect(second.unique).toEqual(first.unique);
    expect(second.duplicates).toEqual([]);
  });
});

import { describe, expect, it } from 'vitest';
import type { FilterSettings } from '../../../shared/config';
import { evaluateArticle, filterArticles } from '../filters';
import type { CanonicalArticle } from '../types';

const NOW = new Date('2026-03-10T12:00:00.000Z');

const options: FilterSettings = {
  minTitleLength: 10,
  minBodyLength: 50,
  maxAgeHours: 72,
  blockedMarkers: ['[Removed]', '[削除済み]'],
};

const buildArticle = (overrides: Partial<CanonicalArticle> = {}): CanonicalArticle => ({
  id: 'a1',
  title: 'Factory output rises in March',
  sourceUrl: 'https://news.example.com/output',
  sourceName: 'Example Wire',
  sourceType: 'wire-news',
  category: 'manufacturing',
  publishedAt: '2026-03-10T08:00:00.000Z',
  fetchedAt: '2026-03-10T12:00:00.000Z',
  language: 'en',
  description: 'x'.repeat(60),
  rawPayload: {},
  isDuplicate: false,
  isCached: false,
  ...overrides,
});

describe('evaluateArticle', () => {
  it('accepts an article that passes every check', () => {
    expect(evaluateArticle(buildArticle(), options, NOW)).toEqual({ accept: true, reasons: [] });
  });

  it('rejects a nine-character title and accepts a ten-character one', () => {
    expect(evaluateArticle(buildArticle({ title: 'Abcdefghi' }), options, NOW).reasons).toEqual(['title_too_short']);
    expect(evaluateArticle(buildArticle({ title: 'Abcdefghij' }), options, NOW).accept).toBe(true);
  });

  it('matches blocked markers case-insensitively', () => {
    expect(evaluateArticle(buildArticle({ title: '[removed] story withdrawn' }), options, NOW).reasons).toEqual(['blocked_marker']);
    expect(evaluateArticle(buildArticle({ title: '[削除済み] 記事は削除されました' }), options, NOW).reasons).toEqual([
      'blocked_marker',
    ]);
  });

  it('enforces the body length boundary', () => {
    expect(evaluateArticle(buildArticle({ description: 'x'.repeat(49) }), options, NOW).reasons).toEqual(['body_too_short']);
    expect(evaluateArticle(buildArticle({ description: 'x'.repeat(50) }), options, NOW).accept).toBe(true);
  });

  it('counts content toward the body', () => {
    const article = buildArticle({ description: 'x'.repeat(20), content: 'y'.repeat(29) });
    expect(evaluateArticle(article, options, NOW).accept).toBe(true);
  });

  it('rejects articles older than the age limit', () => {
    expect(evaluateArticle(buildArticle({ publishedAt: '2026-03-07T12:00:00.000Z' }), options, NOW).accept).toBe(true);
    expect(evaluateArticle(buildArticle({ publishedAt: '2026-03-07T11:59:59.000Z' }), options, NOW).reasons).toEqual([
      'too_old',
    ]);
  });

  it('reports every failing check', () => {
    const article = buildArticle({ title: '[Removed]', description: 'short', publishedAt: '2026-01-01T00:00:00.000Z' });
    expect(evaluateArticle(article, options, NOW).reasons).toEqual(['title_too_short', 'blocked_marker', 'body_too_short', 'too_old']);
  });
});

describe('filterArticles', () => {
  it('keeps input order and returns rejections with reasons', () => {
    const a = buildArticle({ id: 'a' });
    const b = buildArticle({ id: 'b', title: 'Too short' });
    const c = buildArticle({ id: 'c' });
    const result = filterArticles([a, b, c], options, NOW);
    expect(result.accepted.map((article) => article.id)).toEqual(['a', 'c']);
    expect(result.rejected).toEqual([{ article: b, reasons: ['title_too_short'] }]);
  });
});

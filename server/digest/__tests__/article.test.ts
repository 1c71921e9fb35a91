import { describe, expect, it } from 'vitest';
import { assignScores, bodyText, createCanonicalArticle, textLength, type CanonicalArticleInput } from '../article';
import { ValidationError } from '../errors';

const NOW = new Date('2026-03-10T12:00:00.000Z');

const buildInput = (overrides: Partial<CanonicalArticleInput> = {}): CanonicalArticleInput => ({
  id: 'article-1',
  title: 'Central bank holds rates steady',
  sourceUrl: 'https://news.example.com/rates',
  sourceName: 'Example Wire',
  sourceType: 'wire-news',
  category: 'finance',
  publishedAt: '2026-03-10T09:00:00.000Z',
  fetchedAt: '2026-03-10T11:00:00.000Z',
  language: 'en',
  rawPayload: {},
  ...overrides,
});

const captureIssues = (fn: () => unknown): string[] => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  return [];
};

describe('createCanonicalArticle', () => {
  it('fills the duplicate and cache flags', () => {
    const article = createCanonicalArticle(buildInput(), NOW);
    expect(article.isDuplicate).toBe(false);
    expect(article.isCached).toBe(false);
    expect(article.title).toBe('Central bank holds rates steady');
  });

  it('rejects a fetch time earlier than publication', () => {
    const issues = captureIssues(() =>
      createCanonicalArticle(buildInput({ publishedAt: '2026-03-10T10:00:00.000Z', fetchedAt: '2026-03-10T09:00:00.000Z' }), NOW),
    );
    expect(issues).toEqual(['fetchedAt: fetchedAt must not be earlier than publishedAt']);
  });

  it('rejects publication dates in the future', () => {
    const issues = captureIssues(() =>
      createCanonicalArticle(buildInput({ publishedAt: '2026-03-10T13:00:00.000Z', fetchedAt: '2026-03-10T14:00:00.000Z' }), NOW),
    );
    expect(issues).toEqual(['publishedAt: must not be in the future']);
  });

  it('rejects blank required fields', () => {
    const issues = captureIssues(() => createCanonicalArticle(buildInput({ title: '   ' }), NOW));
    expect(issues).toEqual(['title: title is required']);
  });

  it('rejects out-of-range scores', () => {
    expect(() => createCanonicalArticle(buildInput({ relevanceScore: 120 }), NOW)).toThrow(ValidationError);
  });
});

describe('assignScores', () => {
  it('writes in-range scores', () => {
    const article = createCanonicalArticle(buildInput(), NOW);
    assignScores(article, { relevanceScore: 55, credibilityScore: 100 });
    expect(article.relevanceScore).toBe(55);
    expect(article.credibilityScore).toBe(100);
  });

  it('leaves the article untouched when a score is invalid', () => {
    const article = createCanonicalArticle(buildInput(), NOW);
    const issues = captureIssues(() => assignScores(article, { relevanceScore: 101, credibilityScore: 40 }));
    expect(issues).toEqual(['relevanceScore: must be an integer in [0, 100] (got 101)']);
    expect(article.relevanceScore).toBeUndefined();
    expect(article.credibilityScore).toBeUndefined();
  });
});

describe('bodyText', () => {
  it('joins description and content', () => {
    const article = createCanonicalArticle(buildInput({ description: ' Short take ', content: 'Full story' }), NOW);
    expect(bodyText(article)).toBe('Short take\nFull story');
  });

  it('prefers the summary once present', () => {
    const article = createCanonicalArticle(buildInput({ description: 'Short take', summary: 'Summary text' }), NOW);
    expect(bodyText(article)).toBe('Summary text');
  });
});

describe('textLength', () => {
  it('counts code points', () => {
    expect(textLength('日本銀行')).toBe(4);
    expect(textLength('  abc  ')).toBe(3);
    expect(textLength(null)).toBe(0);
  });
});
